/**
 * Report configuration sent alongside the results
 */

export interface InlineConfig {
  kind: 'inline';
  text: string;
}

export interface FileConfig {
  kind: 'file';
  path: string;
}

export type ConfigPayload = InlineConfig | FileConfig;

export function inlineConfig(text: string): InlineConfig {
  return { kind: 'inline', text };
}

export function fileConfig(path: string): FileConfig {
  return { kind: 'file', path };
}
