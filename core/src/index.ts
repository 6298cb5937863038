// Configuration
export {
  Config,
  DatabaseConfig,
  CONFIG_PATH_ENV,
  DEFAULT_CONFIG_FILE,
  defaultConfig,
  resolveConfigPath,
  loadConfig,
} from './config';
export { ConfigurationError } from './errors';

// Query facade
export {
  QueryOps,
  QueryOption,
  QueryRepositories,
  createQueryOps,
  newQueryOpsWithRepositories,
  withRepositories,
  withDriver,
  withConnectionConfig,
} from './query-ops';

// Tools
export {
  Tool,
  ToolResult,
  TextContent,
  defineTool,
  textResult,
  jsonResult,
  errorResult,
} from './tools/tool';
export { createEchoTool, formatEcho } from './tools/echo';
export { createQueryTools } from './tools/query-tools';
export { Toolkit, createToolkit } from './toolkit';
