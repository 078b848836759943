import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { ParseError } from './errors.js';
import { readResolvConf } from './read-file.js';

describe('readResolvConf', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'resolvconf-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('reads and parses a file', async () => {
    const path = join(dir, 'resolv.conf');
    await writeFile(path, 'nameserver 192.0.2.1\noptions ndots:3\n');

    const config = await readResolvConf({ path });

    expect(config.nameservers).toEqual([{ type: 'ipv4', ip: '192.0.2.1' }]);
    expect(config.ndots).toBe(3);
  });

  test('rejects with the parse error', async () => {
    const path = join(dir, 'resolv.conf');
    await writeFile(path, 'search a\nfamily inet5\n');

    await expect(readResolvConf({ path })).rejects.toThrow(ParseError);
    await expect(readResolvConf({ path })).rejects.toMatchObject({
      kind: 'InvalidValue',
      line: 1,
    });
  });

  test('rejects with the file system error', async () => {
    await expect(
      readResolvConf({ path: join(dir, 'missing.conf') })
    ).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
