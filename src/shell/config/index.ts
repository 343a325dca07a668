// CHANGE: Central export file for config module

export { parseCLIArgs, USAGE } from "./cli.js";
export { DEFAULT_CONFIG_FILE, loadConverterConfig } from "./loader.js";
