/**
 * Lua script loader - loads and registers Lua scripts with the Redis client
 *
 * Scripts are loaded lazily on first use and cached for subsequent calls.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { RedisClient } from '../client.js';

/**
 * Script metadata interface
 */
interface ScriptInfo {
  name: string;
  sha: string;
}

/**
 * Registry of loaded Lua scripts
 */
const scriptRegistry = new Map<string, ScriptInfo>();

/**
 * Scripts directory path
 */
const SCRIPTS_DIR = path.join(process.cwd(), 'lib', 'redis', 'lua');

/**
 * Script names
 */
export const LuaScripts = {
  COUNTER_WITH_LIMIT: 'counter_with_limit',
  COUNTER_ADJUST: 'counter_adjust',
} as const;

export type LuaScriptName = (typeof LuaScripts)[keyof typeof LuaScripts];

/**
 * Load a Lua script from file and register it with Redis
 */
async function loadScript(client: RedisClient, name: LuaScriptName): Promise<ScriptInfo> {
  const scriptContent = await fs.readFile(path.join(SCRIPTS_DIR, `${name}.lua`), 'utf-8');
  const sha = await client.scriptLoad(scriptContent);
  const info = { name, sha };
  scriptRegistry.set(name, info);
  return info;
}

/**
 * Get a script by name, loading it if necessary
 */
export async function getScript(client: RedisClient, name: LuaScriptName): Promise<ScriptInfo> {
  return scriptRegistry.get(name) ?? loadScript(client, name);
}

/**
 * Forget loaded scripts (after SCRIPT FLUSH, or between tests)
 */
export function clearScriptRegistry(): void {
  scriptRegistry.clear();
}
