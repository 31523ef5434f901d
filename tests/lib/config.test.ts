import { describe, it, expect, vi } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { TEMP_DIR } from '../setup.js';
import { getDefaultConfig, loadConfig } from '../../src/lib/config.js';

describe('config', () => {
  describe('getDefaultConfig', () => {
    it('should return default configuration', () => {
      const config = getDefaultConfig();

      expect(config.sacct.command).toBe('sacct');
      expect(config.monthly.partitions).toEqual(['lrz-hgx-h100-94x4']);
      expect(config.monthly.outdir).toBe('.');
      expect(config.groups.command).toBe('id');
    });

    it('should return a fresh copy each time', () => {
      const config = getDefaultConfig();
      config.monthly.partitions.push('changed');
      expect(getDefaultConfig().monthly.partitions).toEqual(['lrz-hgx-h100-94x4']);
    });
  });

  describe('loadConfig', () => {
    it('should use defaults when the file is missing', () => {
      expect(loadConfig(join(TEMP_DIR, 'missing.toml'))).toEqual(getDefaultConfig());
    });

    it('should merge file values over defaults', () => {
      const file = join(TEMP_DIR, 'config.toml');
      writeFileSync(file, [
        '[sacct]',
        'command = "/opt/slurm/bin/sacct"',
        '',
        '[monthly]',
        'partitions = ["lrz-dgx-a100-80x8", "mcml-*"]',
      ].join('\n'), 'utf-8');

      const config = loadConfig(file);

      expect(config.sacct.command).toBe('/opt/slurm/bin/sacct');
      expect(config.monthly.partitions).toEqual(['lrz-dgx-a100-80x8', 'mcml-*']);
      expect(config.monthly.outdir).toBe('.');
      expect(config.groups.command).toBe('id');
    });

    it('should accept partitions as a comma-separated string', () => {
      const file = join(TEMP_DIR, 'config.toml');
      writeFileSync(file, '[monthly]\npartitions = "lrz-gpu, lrz-cpu"\noutdir = "/data/usage"\n', 'utf-8');

      const config = loadConfig(file);

      expect(config.monthly.partitions).toEqual(['lrz-gpu', 'lrz-cpu']);
      expect(config.monthly.outdir).toBe('/data/usage');
    });

    it('should ignore values of the wrong type', () => {
      const file = join(TEMP_DIR, 'config.toml');
      writeFileSync(file, '[sacct]\ncommand = 42\n', 'utf-8');

      expect(loadConfig(file).sacct.command).toBe('sacct');
    });

    it('should fall back to defaults on invalid TOML', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const file = join(TEMP_DIR, 'config.toml');
      writeFileSync(file, '[sacct\ncommand = ', 'utf-8');

      expect(loadConfig(file)).toEqual(getDefaultConfig());
      expect(warn).toHaveBeenCalledTimes(1);
      warn.mockRestore();
    });
  });
});
