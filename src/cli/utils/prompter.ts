/**
 * Terminal prompts
 */

import inquirer from "inquirer";
import type { Prompter } from "../../types/workflow.js";

export class InquirerPrompter implements Prompter {
  async input(message: string): Promise<string> {
    const { value } = await inquirer.prompt<{ value: string }>([
      { type: "input", name: "value", message },
    ]);
    return value;
  }

  async confirm(message: string): Promise<boolean> {
    const { value } = await inquirer.prompt<{ value: boolean }>([
      { type: "confirm", name: "value", message, default: false },
    ]);
    return value;
  }
}
