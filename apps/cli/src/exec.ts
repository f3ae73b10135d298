import { stdout } from "node:process";
import { DiagnosticError, formatDiagnostic } from "@keel/compiler/index.js";
import { getConfig } from "./config/index.js";
import {
  compileListHeaders,
  formatHeaderListing,
  writeHeaders,
} from "./output.js";

export const exec = () => main().catch(errorHandler);

async function main() {
  const config = getConfig();
  const headers = compileListHeaders(config);

  if (!config.outDir) {
    stdout.write(formatHeaderListing(headers));
    return;
  }

  const written = await writeHeaders({
    outDir: config.outDir,
    headerDir: config.headerDir,
    headers,
  });
  written.forEach((path) => console.log(path));
}

function errorHandler(error: unknown) {
  if (error instanceof DiagnosticError) {
    error.diagnostics.forEach((diagnostic) =>
      console.error(formatDiagnostic(diagnostic))
    );
    process.exit(1);
  }

  console.error(error);
  process.exit(1);
}
