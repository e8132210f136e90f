/**
 * @arch codeout.test.unit
 */
import { describe, it, expect } from 'vitest';
import { Project, ts } from 'ts-morph';
import { composeArtifact, harnessBlock, LINT_PRELUDE } from '../../../../src/core/emit/harness.js';
import type { HarnessSettings } from '../../../../src/core/config/schema.js';

const defaults: HarnessSettings = { enabled: true, runner: 'vitest', prelude: true };

describe('harnessBlock', () => {
  it('should import test from vitest', () => {
    expect(harnessBlock('bar', 'vitest')).toBe(
      "import { test } from 'vitest';\n\ntest('bar resolves', () => {\n  void bar;\n});\n"
    );
  });

  it('should import test from node:test', () => {
    expect(harnessBlock('bar', 'node:test')).toBe(
      "import { test } from 'node:test';\n\ntest('bar resolves', () => {\n  void bar;\n});\n"
    );
  });

  it('should rely on a global test function', () => {
    expect(harnessBlock('bar', 'globals')).toBe("test('bar resolves', () => {\n  void bar;\n});\n");
  });

  it('should escape quotes in the test name only', () => {
    expect(harnessBlock("it's", 'globals')).toBe("test('it\\'s resolves', () => {\n  void it's;\n});\n");
  });
});

describe('composeArtifact', () => {
  it('should place the source verbatim before the harness', () => {
    expect(composeArtifact('struct Foo;', 'bar', defaults)).toBe(
      "/* eslint-disable */\nstruct Foo;\n\nimport { test } from 'vitest';\n\ntest('bar resolves', () => {\n  void bar;\n});\n"
    );
  });

  it('should not add a newline when the source already ends with one', () => {
    const settings: HarnessSettings = { enabled: true, runner: 'globals', prelude: false };

    expect(composeArtifact('const x = 1;\n', 'x', settings)).toBe(
      "const x = 1;\n\ntest('x resolves', () => {\n  void x;\n});\n"
    );
  });

  it('should keep trailing blank lines of the source', () => {
    const settings: HarnessSettings = { enabled: true, runner: 'globals', prelude: false };

    expect(composeArtifact('a;\n\n', 'a', settings)).toBe("a;\n\n\ntest('a resolves', () => {\n  void a;\n});\n");
  });

  it('should return prelude and source alone when the harness is off', () => {
    const settings: HarnessSettings = { enabled: false, runner: 'vitest', prelude: true };

    expect(composeArtifact('export const a = 1;', 'a', settings)).toBe(`${LINT_PRELUDE}\nexport const a = 1;`);
  });

  it('should return the source untouched with prelude and harness off', () => {
    const settings: HarnessSettings = { enabled: false, runner: 'vitest', prelude: false };

    expect(composeArtifact('  raw\t', 'a', settings)).toBe('  raw\t');
  });

  describe('type-checking the composed file', () => {
    const globalsOnly: HarnessSettings = { enabled: true, runner: 'globals', prelude: true };
    const testDeclaration = 'declare function test(name: string, fn: () => void): void;\n';

    function diagnosticCodes(content: string): number[] {
      const project = new Project({
        useInMemoryFileSystem: true,
        compilerOptions: { strict: true, target: ts.ScriptTarget.ES2022 },
      });
      project.createSourceFile('artifact.ts', content);
      return project.getPreEmitDiagnostics().map((d) => d.getCode());
    }

    it('should compile when the source defines the named module', () => {
      const source = `${testDeclaration}export namespace bar {\n  export const CUSS = 'SPIT';\n}\n`;

      expect(diagnosticCodes(composeArtifact(source, 'bar', globalsOnly))).toEqual([]);
    });

    it('should fail to compile when the name does not resolve', () => {
      const source = `${testDeclaration}export namespace bar {\n  export const CUSS = 'SPIT';\n}\n`;

      // TS2304: Cannot find name
      expect(diagnosticCodes(composeArtifact(source, 'baz', globalsOnly))).toEqual([2304]);
    });
  });
});
