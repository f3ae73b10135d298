import { getConfigFromCli } from "./arg-parser.js";
import type { KeelListsConfig } from "./types.js";

let config: KeelListsConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
