/**
 * @arch codeout.core.domain
 *
 * Composes the artifact text: the generated source followed by a test
 * block that references the generated module by name.
 */
import type { HarnessRunner, HarnessSettings } from '../config/schema.js';

export const LINT_PRELUDE = '/* eslint-disable */';

const RUNNER_IMPORTS: Record<HarnessRunner, string | null> = {
  vitest: "import { test } from 'vitest';",
  'node:test': "import { test } from 'node:test';",
  // Jest and vitest with `globals: true` provide `test` without an import
  globals: null,
};

function quote(text: string): string {
  return `'${text.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * The harness block: one no-op test whose only statement references
 * `identifier`, so compiling the file proves the name resolves.
 */
export function harnessBlock(identifier: string, runner: HarnessRunner): string {
  const lines: string[] = [];
  const importLine = RUNNER_IMPORTS[runner];
  if (importLine) {
    lines.push(importLine, '');
  }
  lines.push(
    `test(${quote(`${identifier} resolves`)}, () => {`,
    `  void ${identifier};`,
    '});'
  );
  return `${lines.join('\n')}\n`;
}

/**
 * Build the text written to disk. The source is copied verbatim; a newline
 * is added only when it does not already end with one.
 */
export function composeArtifact(source: string, identifier: string, settings: HarnessSettings): string {
  let content = settings.prelude ? `${LINT_PRELUDE}\n${source}` : source;
  if (!settings.enabled) {
    return content;
  }
  if (!content.endsWith('\n')) {
    content += '\n';
  }
  return `${content}\n${harnessBlock(identifier, settings.runner)}`;
}
