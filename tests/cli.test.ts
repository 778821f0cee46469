import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parseGenerateArgs, run } from '../src/cli';
import { InvalidOptionsError } from '../src/core/errors';

describe('generate argument parsing', () => {
  it('reads flags', () => {
    const command = parseGenerateArgs(['--frames', '120', '--size', '4.5GB', '--output', 'out', '--seed', '9', '--quiet']);
    expect(command).toEqual({
      options: { frameCount: 120, totalSize: '4.5GB', outputDir: 'out', seed: 9, dicomdir: true },
      quiet: true,
    });
  });

  it('accepts the positional form and short flags', () => {
    expect(parseGenerateArgs(['5', '5MB', 'out', '--no-dicomdir']).options).toEqual({
      frameCount: 5,
      totalSize: '5MB',
      outputDir: 'out',
      seed: undefined,
      dicomdir: false,
    });
    expect(parseGenerateArgs(['-n', '2', '-s', '1MB', '-o', 'x']).options.frameCount).toBe(2);
  });

  it('rejects missing values, unknown flags and incomplete commands', () => {
    expect(() => parseGenerateArgs(['--frames'])).toThrow('Missing value for --frames');
    expect(() => parseGenerateArgs(['--frames', '--size', '5MB'])).toThrow(InvalidOptionsError);
    expect(() => parseGenerateArgs(['--verbose'])).toThrow('Unknown option: --verbose');
    expect(() => parseGenerateArgs(['5', '5MB'])).toThrow(InvalidOptionsError);
  });
});

describe('cli', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mri-cli-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('generates a series and inspects it', () => {
    const outputDir = path.join(dir, 'series');
    expect(run(['generate', '--frames', '2', '--size', '1MB', '--output', outputDir, '--seed', '11', '--quiet'])).toBe(0);
    expect(console.log).not.toHaveBeenCalled();
    expect(fs.readdirSync(outputDir).sort()).toEqual(['DICOMDIR', 'IMG0001', 'IMG0002']);

    expect(run(['inspect', outputDir])).toBe(0);
    const printed = vi.mocked(console.log).mock.calls[0][0];
    const report: unknown = JSON.parse(String(printed));
    expect(report).toMatchObject({ source_directory: outputDir, file_count: 2 });
  });

  it('prints progress unless quiet', () => {
    const outputDir = path.join(dir, 'loud');
    expect(run(['generate', '1', '1MB', outputDir, '--seed', '12'])).toBe(0);
    const lines = vi.mocked(console.log).mock.calls.map((call) => String(call[0]));
    expect(lines[0]).toBe('Generating 1 MR images of 512x512 (target 1.00 MB)');
    expect(lines).toContain('Seed: 12');
    expect(lines).toContain('DICOMDIR written with 4 records');
  });

  it('returns 1 and prints the error for invalid input', () => {
    expect(run(['generate', '--frames', '0', '--size', '5MB', '--output', dir])).toBe(1);
    expect(run(['generate', '--frames', '1', '--size', '5XB', '--output', dir])).toBe(1);
    expect(vi.mocked(console.error).mock.calls[1][0]).toBe(
      "Error: Invalid size format: '5XB'. Use a format like '100MB' or '4.5GB'"
    );
  });

  it('handles help, unknown commands and missing directories', () => {
    expect(run(['help'])).toBe(0);
    expect(run([])).toBe(1);
    expect(run(['bogus'])).toBe(1);
    expect(console.error).toHaveBeenCalledWith('Unknown command: bogus');
    expect(run(['inspect', path.join(dir, 'missing')])).toBe(1);
  });
});
