/**
 * Static HTML listing
 */

import type { SiteFolder } from "../../types/publish.js";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

const STYLES = `        body { font-family: sans-serif; line-height: 1.6; }
        .folder { color: #2c3e50; }
        .file { color: #34495e; }
        ul { list-style: none; padding-left: 20px; }
        li { margin: 5px 0; }
        a { color: #2980b9; text-decoration: none; }
        a:hover { text-decoration: underline; }`;

/**
 * Nested list items for a folder
 */
export function renderFolder(folder: SiteFolder): string {
  let html = "";

  for (const [name, value] of Object.entries(folder)) {
    if (typeof value === "string") {
      html += `<li class="file">📄 <a href="${escapeHtml(value)}">${escapeHtml(name)}</a></li>`;
    } else {
      html += `<li class="folder">📁 ${escapeHtml(name)}\n<ul>${renderFolder(value)}</ul></li>`;
    }
  }

  return html;
}

/**
 * Full document for an uploader → folder tree
 */
export function renderSiteHtml(tree: Record<string, SiteFolder>): string {
  let html = `<!DOCTYPE html>
<html>
<head>
    <meta charset="utf-8">
    <title>Archive Uploads</title>
    <style>
${STYLES}
    </style>
</head>
<body>
    <h1>📁 Archived Files</h1>`;

  for (const [uploader, folder] of Object.entries(tree)) {
    html += `\n<h2>👤 Uploader: ${escapeHtml(uploader)}</h2>\n<ul>${renderFolder(folder)}</ul>`;
  }

  html += "\n</body>\n</html>\n";
  return html;
}
