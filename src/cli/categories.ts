import path from "node:path";

export const CATEGORIES = [
  { label: "Images", extensions: [".jpg", ".jpeg", ".png", ".gif", ".bmp", ".webp"] },
  { label: "Videos", extensions: [".mp4", ".mkv", ".flv", ".mov", ".avi"] },
  { label: "Documents", extensions: [".pdf", ".docx", ".doc", ".txt", ".pptx", ".xlsx"] },
  { label: "Audio", extensions: [".mp3", ".wav", ".aac", ".ogg"] },
  { label: "Archives", extensions: [".zip", ".rar", ".tar", ".gz"] },
  { label: "Code", extensions: [".py", ".cpp", ".java", ".html", ".css", ".js"] },
] as const satisfies readonly { label: string; extensions: readonly string[] }[];

export const DEFAULT_CATEGORY = "Others";

export type CategoryLabel = (typeof CATEGORIES)[number]["label"] | typeof DEFAULT_CATEGORY;

/** Lowercased extension with its leading dot, or "" when the name has none. */
export function extensionOf(filename: string): string {
  return path.extname(filename).toLowerCase();
}

export function categorize(filename: string): CategoryLabel {
  const ext = extensionOf(filename);
  if (!ext) return DEFAULT_CATEGORY;
  for (const category of CATEGORIES) {
    const extensions: readonly string[] = category.extensions;
    if (extensions.includes(ext)) return category.label;
  }
  return DEFAULT_CATEGORY;
}
