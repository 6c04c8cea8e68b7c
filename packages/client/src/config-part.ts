import * as fs from 'node:fs';
import * as path from 'node:path';
import { NotFoundError, type ConfigPayload, type ResolvedConfigPart } from '@report-upload/core';
import { INLINE_CONFIG_FILENAME } from './config.js';

/**
 * Turn a config payload into named bytes.
 * Blank inline text yields no part; a file reference must point at a regular file.
 */
export async function resolveConfigPart(config?: ConfigPayload): Promise<ResolvedConfigPart | undefined> {
  if (!config) return undefined;

  switch (config.kind) {
    case 'inline': {
      const text = config.text.trim();
      if (!text) return undefined;
      return { filename: INLINE_CONFIG_FILENAME, content: Buffer.from(text, 'utf-8') };
    }
    case 'file': {
      const stats = await fs.promises.stat(config.path).catch(() => undefined);
      if (!stats?.isFile()) {
        throw new NotFoundError(config.path, 'file', 'Config file');
      }
      return {
        filename: path.basename(config.path),
        content: await fs.promises.readFile(config.path),
      };
    }
  }
}
