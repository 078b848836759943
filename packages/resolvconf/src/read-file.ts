import { readFile } from 'node:fs/promises';
import type { Config } from './config.js';
import { RESOLV_CONF_PATH } from './constants.js';
import { parseConfig } from './grammar.js';

export type ReadResolvConfOptions = {
  /**
   * Path of the resolver configuration file.
   * @default '/etc/resolv.conf'
   */
  path?: string | URL;
};

/**
 * Reads and parses a resolver configuration file.
 *
 * Rejects with the file system error if the file cannot be read,
 * or with a `ParseError` if its contents are invalid.
 */
export async function readResolvConf(
  options: ReadResolvConfOptions = {}
): Promise<Config> {
  const data = await readFile(options.path ?? RESOLV_CONF_PATH);
  return parseConfig(data);
}
