/**
 * Shared utilities for CLI commands and the report view.
 */

export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/** `APP__ACCOUNT.sql` → `APP__ACCOUNT` */
export function fileStem(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  return dot > 0 ? fileName.slice(0, dot) : fileName;
}

/** `APP__ACCOUNT.sql` → `APP.ACCOUNT`, the key diagnostics are logged under */
export function tableNameFromFile(fileName: string): string {
  return fileStem(fileName).replace("__", ".");
}
