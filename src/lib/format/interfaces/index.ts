export type { CliDefaults, ImageConfig, InflateConfig } from "./config.ts";
export {
  DEFAULT_CLI_DEFAULTS,
  DEFAULT_IMAGE_CONFIG,
  DEFAULT_INFLATE_CONFIG,
} from "./defaults.ts";
