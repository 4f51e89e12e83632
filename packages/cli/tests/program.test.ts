import { readFileSync } from 'node:fs';
import { describe, expect, it } from 'vitest';
import { createProgram } from '../src/program.js';

function findCommand(path: string[]) {
  let current = createProgram();
  for (const name of path) {
    const next = current.commands.find((c) => c.name() === name);
    if (!next) return undefined;
    current = next;
  }
  return current;
}

describe('baton program', () => {
  it('publishes the bundled entry point as the baton binary', () => {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
    expect(pkg).toMatchObject({ bin: { baton: './dist/index.js' }, scripts: { build: 'tsup' } });
  });

  it('registers the top-level commands', () => {
    const names = createProgram().commands.map((c) => c.name());
    expect(names).toEqual(['init', 'validate', 'run', 'resume', 'sessions', 'workflows']);
  });

  it('registers run options', () => {
    const options = findCommand(['run'])?.options.map((o) => o.long);
    expect(options).toEqual(['--message', '--workspace', '--timeout', '--script', '--verbose']);
  });

  it('registers sessions list and show', () => {
    expect(findCommand(['sessions', 'list'])?.options.map((o) => o.long)).toEqual(['--status', '--limit']);
    expect(findCommand(['sessions', 'show'])?.options.map((o) => o.long)).toEqual(['--json']);
  });

  it('rejects a non-numeric timeout', () => {
    const program = createProgram();
    program.exitOverride();
    program.configureOutput({ writeErr: () => {} });
    for (const command of program.commands) {
      command.exitOverride();
      command.configureOutput({ writeErr: () => {} });
    }

    expect(() => program.parse(['run', 'flow', '--timeout', 'soon'], { from: 'user' })).toThrow(
      /Must be a positive integer/,
    );
  });
});
