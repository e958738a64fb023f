import path from "path";

/**
 * Resolves a file inside the data directory. Handles both development
 * (running from backend/) and running from the repository root.
 */
export function resolveDataFile(fileName: string): string {
  const dataDir = process.cwd().includes("backend") ? "../data" : "data";
  return path.resolve(dataDir, fileName);
}
