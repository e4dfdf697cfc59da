export function escapeText(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

export function escapeAttribute(str: string): string {
  return escapeText(str)
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}
