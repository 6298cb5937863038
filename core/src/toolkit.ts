import { Config, loadConfig } from './config';
import { createQueryOps, withConnectionConfig, QueryOps } from './query-ops';
import { createEchoTool } from './tools/echo';
import { createQueryTools } from './tools/query-tools';
import { Tool } from './tools/tool';

export interface Toolkit {
  config: Config;
  ops: QueryOps;
  tools: Tool[];
  /** Releases the database connection. */
  close(): void;
}

/**
 * Loads the configuration, connects to the database it names and returns
 * the tools for a protocol server to register.
 */
export async function createToolkit(config: Config = loadConfig()): Promise<Toolkit> {
  const { database } = config;
  console.log(`[Tools] Database configuration loaded: file=${database.filename}, timeout=${database.timeoutMs}ms`);

  const ops = await createQueryOps(withConnectionConfig(database));
  const tools = [createEchoTool(), ...createQueryTools(ops)];

  console.log(`[Tools] Ready: ${tools.map(t => t.name).join(', ')}`);
  return {
    config,
    ops,
    tools,
    close: () => ops.close(),
  };
}
