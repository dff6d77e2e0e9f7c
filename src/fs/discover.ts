import path from "node:path";
import fg from "fast-glob";

export const DEFAULT_SPEC_EXCLUDES = ["**/node_modules/**", "**/.git/**", "**/.fleetlens/**"];

interface DiscoverOptions {
  root: string;
  patterns: string[];
  exclude?: string[];
}

export async function discoverSpecFiles(options: DiscoverOptions): Promise<string[]> {
  const entries = await fg(options.patterns, {
    cwd: options.root,
    ignore: options.exclude ?? DEFAULT_SPEC_EXCLUDES,
    onlyFiles: true,
    followSymbolicLinks: false,
    absolute: true,
    unique: true
  });

  return entries.filter((file) => path.extname(file).toLowerCase() === ".json").sort();
}
