import { pathToFileURL } from "node:url";

/** True when the module behind `importMetaUrl` is the script node was started with. */
export function isMainModule(importMetaUrl: string, entry: string | undefined = process.argv[1]): boolean {
  if (!entry) return false;
  return importMetaUrl === pathToFileURL(entry).href;
}
