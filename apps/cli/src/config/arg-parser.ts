import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import type { KeelListsConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

const INCLUDE_PATH = /^[A-Za-z0-9_][A-Za-z0-9_.-]*(\/[A-Za-z0-9_][A-Za-z0-9_.-]*)*$/;

const parseHeaderDir = (value: string): string => {
  if (INCLUDE_PATH.test(value)) {
    return value;
  }
  throw new InvalidArgumentError(
    `invalid header directory "${value}" (expected a relative include path)`,
  );
};

const createBaseCommand = ({
  name,
  description,
}: {
  name: string;
  description: string;
}): Command =>
  new Command()
    .name(name)
    .description(description)
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command");

type ListsOptions = {
  outDir?: string;
  headerDir: string;
  accessCache: boolean;
  prelude: boolean;
};

export const getConfigFromCli = (
  argv: readonly string[] = process.argv.slice(2),
): KeelListsConfig => {
  const program = createBaseCommand({
    name: "keel-lists",
    description: "Emit the C headers of the list runtime",
  });

  program
    .argument("[types...]", "element types to instantiate, e.g. u8 'list[Point]'")
    .option("--out-dir <dir>", "write headers below this directory instead of stdout")
    .option(
      "--header-dir <name>",
      "include directory the headers refer to each other through",
      parseHeaderDir,
      "keel_headers",
    )
    .option("--no-access-cache", "emit get/set without the forward access cache")
    .option("--no-prelude", "skip the prelude element types");

  program.parse(["node", "keel-lists", ...argv]);
  const opts = program.opts<ListsOptions>();

  return {
    elementTypes: [...program.args],
    outDir: opts.outDir,
    headerDir: opts.headerDir,
    accessCache: opts.accessCache,
    prelude: opts.prelude,
  };
};
