export { runCli, parseArgs, VERSION, HELP_TEXT, type ParsedArgs, type RunCliOptions } from './run.js';
export {
  loadDocsignConfig,
  loadEnvOverrides,
  findConfigFile,
  validateConfigFile,
  ConfigError,
  type DocsignConfigFile,
  type LoadedDocsignConfig,
  type LoadConfigOptions,
} from './config.js';
export {
  keygenCommand,
  pubkeyCommand,
  signCommand,
  verifyCommand,
  type CommandContext,
  type KeygenOptions,
  type KeygenResult,
  type PubkeyOptions,
  type PubkeyResult,
  type SignOptions,
  type SignResult,
  type VerifyOptions,
  type VerifyResult,
} from './sign-commands.js';
