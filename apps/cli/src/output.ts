import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  createCompilation,
  emitProgramHeaders,
  parseElementType,
} from "@keel/compiler/index.js";
import type { KeelListsConfig } from "./config/types.js";

export type HeaderFiles = Record<string, string>;

export const compileListHeaders = (
  config: Omit<KeelListsConfig, "outDir">
): HeaderFiles => {
  const ctx = createCompilation({
    accessCache: config.accessCache,
    headerDir: config.headerDir,
    ...(config.prelude ? {} : { preludeElementTypes: [] }),
  });
  config.elementTypes.forEach((text) =>
    ctx.lists.resolve(parseElementType(text, ctx.diagnostics))
  );
  return emitProgramHeaders(ctx);
};

/** Every header behind a `// <file>` banner, for printing to stdout. */
export const formatHeaderListing = (headers: HeaderFiles): string =>
  Object.entries(headers)
    .map(([file, source]) => `// ${file}\n${source}`)
    .join("\n");

export const writeHeaders = async ({
  outDir,
  headerDir,
  headers,
}: {
  outDir: string;
  headerDir: string;
  headers: HeaderFiles;
}): Promise<string[]> => {
  const dir = join(outDir, headerDir);
  await mkdir(dir, { recursive: true });
  return Promise.all(
    Object.entries(headers).map(async ([file, source]) => {
      const path = join(dir, file);
      await writeFile(path, source, "utf8");
      return path;
    })
  );
};
