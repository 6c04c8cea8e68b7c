import { describe, it, expect } from 'vitest';
import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const rootDir = fileURLToPath(new URL('../../../', import.meta.url));

const manifestSchema = z.object({
  exports: z
    .object({
      '.': z.object({ source: z.string(), types: z.string(), default: z.string() }),
    })
    .optional(),
  bin: z.record(z.string()).optional(),
});

const buildConfigSchema = z.object({
  compilerOptions: z.object({ rootDir: z.string(), outDir: z.string(), customConditions: z.array(z.string()) }),
});

function readJson<T>(relativePath: string, schema: z.ZodType<T>): T {
  return schema.parse(JSON.parse(fs.readFileSync(`${rootDir}${relativePath}`, 'utf-8')));
}

describe('package layout', () => {
  it.each(['core', 'archive', 'client', 'cli'])('should export built JavaScript from %s', (name) => {
    const manifest = readJson(`packages/${name}/package.json`, manifestSchema);
    const build = readJson(`packages/${name}/tsconfig.build.json`, buildConfigSchema);

    expect(build.compilerOptions).toEqual({ rootDir: 'src', outDir: 'dist', customConditions: [] });
    expect(manifest.exports?.['.']).toEqual({
      source: './src/index.ts',
      types: './dist/index.d.ts',
      default: './dist/index.js',
    });
    expect(fs.existsSync(`${rootDir}packages/${name}/src/index.ts`)).toBe(true);
  });

  it('should point the command at the compiled entry point', () => {
    const root = readJson('package.json', manifestSchema);
    const cli = readJson('packages/cli/package.json', manifestSchema);

    expect(root.bin).toEqual({ 'report-upload': 'packages/cli/dist/bin/report-upload.js' });
    expect(cli.bin).toEqual({ 'report-upload': './dist/bin/report-upload.js' });
    expect(fs.existsSync(`${rootDir}packages/cli/src/bin/report-upload.ts`)).toBe(true);
  });
});
