/**
 * Init command - Initialize archive-ledger.config.ts
 */

import { Command } from "commander";
import inquirer from "inquirer";
import fs from "node:fs";
import path from "node:path";
import chalk from "chalk";
import { generateExampleConfig } from "../../core/config/utils.js";
import { ensureGitignoreEntries } from "../../core/utils/gitignore.js";

const CONFIG_FILE = "archive-ledger.config.ts";

interface InitAnswers {
  collection: string;
  maxFileSizeMB: number;
  pagesBranch: string;
}

const DEFAULT_ANSWERS: InitAnswers = {
  collection: "opensource",
  maxFileSizeMB: 500,
  pagesBranch: "gh-pages",
};

/**
 * Whether a prompt failed because there is no terminal to draw it on
 */
function isTtyError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "isTtyError" in error && error.isTtyError === true;
}

async function promptUser(interactive: boolean): Promise<InitAnswers> {
  if (!interactive) {
    return DEFAULT_ANSWERS;
  }

  return inquirer.prompt<InitAnswers>([
    {
      type: "input",
      name: "collection",
      message: "Archive collection:",
      default: DEFAULT_ANSWERS.collection,
      validate: (input: string) => (input.trim() ? true : "Collection is required"),
    },
    {
      type: "number",
      name: "maxFileSizeMB",
      message: "Largest file to upload (MB):",
      default: DEFAULT_ANSWERS.maxFileSizeMB,
      validate: (input: number) =>
        Number.isFinite(input) && input > 0 ? true : "Enter a positive number",
    },
    {
      type: "input",
      name: "pagesBranch",
      message: "GitHub Pages branch:",
      default: DEFAULT_ANSWERS.pagesBranch,
      validate: (input: string) => (input.trim() ? true : "Branch name is required"),
    },
  ]);
}

export function createInitCommand(): Command {
  return new Command("init")
    .description(`Initialize ${CONFIG_FILE} configuration file`)
    .option("-f, --force", "Overwrite existing config file")
    .option("-y, --yes", "Skip prompts and use default values")
    .action(async (options: { force?: boolean; yes?: boolean }) => {
      const configPath = path.join(process.cwd(), CONFIG_FILE);

      if (fs.existsSync(configPath) && !options.force) {
        console.log(chalk.yellow(`\n⚠️  ${CONFIG_FILE} already exists!`));
        console.log(chalk.dim("Use --force to overwrite or edit the file manually.\n"));
        process.exit(1);
      }

      try {
        console.log(chalk.blue("\n🚀 Initializing archive-ledger configuration...\n"));

        const answers = await promptUser(!options.yes);
        fs.writeFileSync(configPath, generateExampleConfig(answers), "utf-8");

        console.log(chalk.green("\n✅ Configuration file created successfully!\n"));
        console.log(chalk.dim(`📄 Created: ${CONFIG_FILE}\n`));

        ensureGitignoreEntries([".push_state", "Failed.log"]);
        console.log();

        console.log(chalk.bold("Next steps:\n"));
        console.log(chalk.dim("  1. Add your Internet Archive keys to .env"));
        console.log(chalk.dim(`     ${chalk.cyan("IA_ACCESS_KEY=... IA_SECRET_KEY=...")}\n`));
        console.log(chalk.dim("  2. Upload a directory"));
        console.log(chalk.dim(`     ${chalk.cyan("npx archive-ledger upload ./files")}\n`));
      } catch (error) {
        if (isTtyError(error)) {
          console.error(chalk.red("\n❌ Prompt could not be rendered in this environment."));
          console.log(chalk.dim("Use --yes flag for non-interactive mode.\n"));
        } else {
          console.error(chalk.red("\n❌ Failed to create config file:"), error);
        }
        process.exit(1);
      }
    });
}
