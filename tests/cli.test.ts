import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createProgram, outputFileName } from '../src/cli';

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('cli', () => {
  it('registers every command', () => {
    const program = createProgram();
    expect(program.commands.map((c) => c.name())).toEqual(['repos', 'generate', 'commit', 'refine', 'backups', 'health']);

    const backups = program.commands.find((c) => c.name() === 'backups');
    expect(backups?.commands.map((c) => c.name())).toEqual(['list', 'show', 'delete', 'restore', 'prune']);
  });

  it('names output files after the repository', () => {
    expect(outputFileName('octo/demo')).toBe('octo_demo.md');
  });
});

describe('generate --json', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'readme-cli-'));
    vi.stubEnv('GITHUB_TOKEN', 'test-token');
    vi.stubEnv('LLM_PROVIDER', 'ollama');
    vi.stubEnv('README_BACKUP_DIR', join(dir, 'backups'));
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>(async (input) =>
        String(input).endsWith('/user')
          ? json({ login: 'octo', name: null, avatar_url: '' })
          : json({ message: 'Not Found' }, 404)
      )
    );
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  it('prints nothing but the results document on stdout', async () => {
    const stdout: string[] = [];
    vi.spyOn(console, 'log').mockImplementation((message: unknown) => {
      stdout.push(String(message));
    });
    const stdoutWrite = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    await createProgram().parseAsync(['generate', 'octo/missing', '--json', '-o', join(dir, 'out')], { from: 'user' });

    expect(JSON.parse(stdout.join('\n'))).toEqual([
      { repoName: 'octo/missing', success: false, error: 'Repository not found: octo/missing' },
    ]);
    expect(stdoutWrite).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });
});
