import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { spawn } from 'node:child_process';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

const CLI_PATH = fileURLToPath(new URL('../../src/cli/bin.ts', import.meta.url));
const PACKAGE_DIR = fileURLToPath(new URL('../..', import.meta.url));
const TEST_DIR = join(tmpdir(), 'groupex-bin-test-' + Date.now());

/**
 * Helper to run the CLI with arguments and capture output.
 */
function runCli(args: string[]): Promise<{ code: number; stdout: string; stderr: string }> {
  return new Promise((resolve) => {
    const proc = spawn(process.execPath, ['--import', 'tsx', CLI_PATH, ...args], {
      cwd: PACKAGE_DIR,
      env: { ...process.env, NODE_ENV: 'test' },
    });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data) => {
      stderr += data.toString();
    });

    proc.on('close', (code) => {
      resolve({ code: code ?? 1, stdout, stderr });
    });
  });
}

describe('CLI bin', { timeout: 30_000 }, () => {
  beforeAll(() => {
    mkdirSync(TEST_DIR, { recursive: true });
    writeFileSync(
      join(TEST_DIR, 'songs.txt'),
      ['Bob Marley - Jammin', 'Ziggy Marley - Dragonfly', 'Duane Stephenson - Exhale', ''].join('\n'),
    );
  });

  afterAll(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  describe('help and version', () => {
    it('should show help with --help flag', async () => {
      const { code, stdout } = await runCli(['--help']);
      expect(code).toBe(0);
      expect(stdout).toContain('groupex - Grouped value and operator expressions');
      expect(stdout).toContain('--grammar <name|path>');
    });

    it('should show help with -h', async () => {
      const { code, stdout } = await runCli(['-h']);
      expect(code).toBe(0);
      expect(stdout).toContain('Exit Codes:');
    });

    it('should show version with version command', async () => {
      const { code, stdout } = await runCli(['version']);
      expect(code).toBe(0);
      expect(stdout).toBe('groupex v0.1.0\n');
    });
  });

  describe('eval', () => {
    it('should print the value', async () => {
      const { code, stdout } = await runCli(['eval', '(2 + 3) * 4']);
      expect(code).toBe(0);
      expect(stdout).toBe('20\n');
    });

    it('should print JSON with --json', async () => {
      const { code, stdout } = await runCli(['eval', '1 + 2', '--json']);
      expect(code).toBe(0);
      expect(JSON.parse(stdout)).toEqual({ value: 3, consumedLength: 3 });
    });

    it('should print the tree before the value with --tree', async () => {
      const { stdout } = await runCli(['eval', '1 + 2', '--tree']);
      expect(stdout).toBe('Group(Value(1),Op(+),Value(2))\n3\n');
    });

    it('should use the grammar named by --grammar', async () => {
      const { code, stdout } = await runCli(['eval', 'true && !false', '--grammar', 'boolean']);
      expect(code).toBe(0);
      expect(stdout).toBe('true\n');
    });

    it('should exit 1 with a caret on a syntax error', async () => {
      const { code, stdout, stderr } = await runCli(['eval', '1 +']);
      expect(code).toBe(1);
      expect(stdout).toBe('');
      expect(stderr).toContain('InvalidOperandError: Left or right operand is missing at position 2\n  1 +\n    ^');
    });

    it('should exit 2 without an expression', async () => {
      const { code, stderr } = await runCli(['eval']);
      expect(code).toBe(2);
      expect(stderr).toContain('Usage: groupex eval <expression>');
    });
  });

  describe('filter', () => {
    it('should print the matching lines', async () => {
      const { code, stdout } = await runCli(['filter', 'marley && !ziggy', join(TEST_DIR, 'songs.txt'), '-q']);
      expect(code).toBe(0);
      expect(stdout).toBe('Bob Marley - Jammin\n');
    });

    it('should exit 1 for a missing file', async () => {
      const missing = join(TEST_DIR, 'missing.txt');
      const { code, stderr } = await runCli(['filter', 'marley', missing]);
      expect(code).toBe(1);
      expect(stderr).toContain(`File not found: ${missing}`);
    });

    it('should exit 2 without a file', async () => {
      const { code, stderr } = await runCli(['filter', 'marley']);
      expect(code).toBe(2);
      expect(stderr).toContain('Usage: groupex filter <expression> <file>');
    });
  });

  describe('--log-level validation', () => {
    it('should log debug entries at debug level', async () => {
      const { code, stdout } = await runCli(['eval', '1 + 2', '--log-level', 'debug']);
      expect(code).toBe(0);
      expect(stdout).toContain('[groupex] DEBUG Evaluated expression');
      expect(stdout.endsWith('3\n')).toBe(true);
    });

    it('should reject an unknown level', async () => {
      const { code, stderr } = await runCli(['eval', '1 + 2', '--log-level', 'loud']);
      expect(code).toBe(2);
      expect(stderr).toContain('Invalid log level: loud');
    });
  });

  it('should exit 2 for an unknown command', async () => {
    const { code, stderr } = await runCli(['frobnicate']);
    expect(code).toBe(2);
    expect(stderr).toContain('Unknown command: frobnicate');
  });
});
