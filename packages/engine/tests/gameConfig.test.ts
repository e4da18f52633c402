import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { clearConfigCache, loadGameConfig, parseGameConfig } from '../src/config/gameConfig.js';
import { InvalidConfigurationError } from '../src/errors.js';

describe('gameConfig', () => {
  describe('parseGameConfig', () => {
    it('should accept a complete configuration', () => {
      const config = parseGameConfig({
        game: { maxSecretNumber: 20 },
        server: { wsPort: 4001, httpPort: 4002 },
      });

      expect(config.game.maxSecretNumber).toBe(20);
      expect(config.server).toEqual({ wsPort: 4001, httpPort: 4002 });
    });

    it('should default maxSecretNumber to 10', () => {
      const config = parseGameConfig({ game: {}, server: { wsPort: 1, httpPort: 2 } });

      expect(config.game.maxSecretNumber).toBe(10);
    });

    it('should reject a zero maxSecretNumber', () => {
      expect(() =>
        parseGameConfig({ game: { maxSecretNumber: 0 }, server: { wsPort: 1, httpPort: 2 } })
      ).toThrow(InvalidConfigurationError);
    });

    it('should name the offending path', () => {
      expect(() => parseGameConfig({ game: {}, server: { wsPort: 'x', httpPort: 2 } })).toThrow(
        /server\.wsPort/
      );
    });
  });

  describe('loadGameConfig', () => {
    let dir: string;
    const originalPath = process.env['CONFIG_PATH'];

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'guess-config-'));
      clearConfigCache();
    });

    afterEach(() => {
      clearConfigCache();
      if (originalPath === undefined) {
        delete process.env['CONFIG_PATH'];
      } else {
        process.env['CONFIG_PATH'] = originalPath;
      }
      rmSync(dir, { recursive: true, force: true });
    });

    it('should load the file named by CONFIG_PATH', () => {
      const file = join(dir, 'game.yaml');
      writeFileSync(file, 'game:\n  maxSecretNumber: 6\nserver:\n  wsPort: 5001\n  httpPort: 5002\n');
      process.env['CONFIG_PATH'] = file;

      expect(loadGameConfig()).toEqual({
        game: { maxSecretNumber: 6 },
        server: { wsPort: 5001, httpPort: 5002 },
      });
    });

    it('should cache the first load', () => {
      const file = join(dir, 'game.yaml');
      writeFileSync(file, 'game:\n  maxSecretNumber: 6\nserver:\n  wsPort: 5001\n  httpPort: 5002\n');
      process.env['CONFIG_PATH'] = file;
      const first = loadGameConfig();

      writeFileSync(file, 'game:\n  maxSecretNumber: 8\nserver:\n  wsPort: 5001\n  httpPort: 5002\n');

      expect(loadGameConfig()).toBe(first);
    });

    it('should read the repository default when CONFIG_PATH is unset', () => {
      delete process.env['CONFIG_PATH'];

      expect(loadGameConfig().game.maxSecretNumber).toBe(10);
    });
  });
});
