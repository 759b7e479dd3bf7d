/**
 * Configuration - Unit Tests
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../src/core/errors.js';
import { ConfigManager } from '../../src/core/QuizConfig.js';
import { createTempDir, type TempDir } from '../factories/index.js';

describe('ConfigManager', () => {
  it('fills in defaults', () => {
    const config = new ConfigManager().getConfig();

    expect(config.quiz).toEqual({ numChoices: 10, strictScoring: true, historySize: 25 });
    expect(config.images.thumbnailWidth).toBe(400);
    expect(config.paths).toEqual({ dataDir: './data/cars', indexDir: './index', assetsDir: './assets' });
    expect(config.logging).toEqual({ level: 'info', pretty: false });
    expect(config.ui.title).toBe('Car Picker');
  });

  it('rejects invalid values', () => {
    expect(() => new ConfigManager({ paths: { dataDir: '' } })).toThrow(ConfigurationError);
    expect(() => new ConfigManager({ images: { thumbnailWidth: 0 } })).toThrow(ConfigurationError);
  });

  it('merges updates one section at a time', () => {
    const manager = new ConfigManager({ paths: { dataDir: '/photos' } });
    manager.update({ paths: { indexDir: '/cache' } });

    expect(manager.get('paths')).toEqual({ dataDir: '/photos', indexDir: '/cache', assetsDir: './assets' });
    expect(manager.validate()).toEqual({ valid: true, errors: [] });
  });

  it('applies environment overrides', () => {
    const manager = ConfigManager.fromEnv({
      CAR_PICKER_DATA_DIR: '/srv/cars',
      CAR_PICKER_DOCS_DIR: '/srv/site',
      CAR_PICKER_STRICT_SCORING: 'false',
      CAR_PICKER_LOG_LEVEL: 'debug',
    });
    const config = manager.getConfig();

    expect(config.paths.dataDir).toBe('/srv/cars');
    expect(config.paths.docsDir).toBe('/srv/site');
    expect(config.quiz.strictScoring).toBe(false);
    expect(config.logging.level).toBe('debug');
  });

  it('rejects an unknown log level from the environment', () => {
    expect(() => ConfigManager.fromEnv({ CAR_PICKER_LOG_LEVEL: 'loud' })).toThrow(ConfigurationError);
  });

  describe('fromFile', () => {
    let dir: TempDir;

    beforeEach(async () => {
      dir = await createTempDir();
    });

    afterEach(async () => {
      await dir.cleanup();
    });

    it('loads a JSON file and lets the environment win', async () => {
      const path = await dir.write(
        'car-picker.json',
        JSON.stringify({ paths: { dataDir: './cars' }, quiz: { strictScoring: false } })
      );
      const config = (await ConfigManager.fromFile(path, { CAR_PICKER_STRICT_SCORING: 'yes' })).getConfig();

      expect(config.paths.dataDir).toBe('./cars');
      expect(config.quiz.strictScoring).toBe(true);
    });

    it('reports unreadable files', async () => {
      const broken = await dir.write('broken.json', '{');
      const invalid = await dir.write('invalid.json', JSON.stringify({ quiz: { numChoices: 5 } }));

      await expect(ConfigManager.fromFile(broken, {})).rejects.toBeInstanceOf(ConfigurationError);
      await expect(ConfigManager.fromFile(invalid, {})).rejects.toBeInstanceOf(ConfigurationError);
      await expect(ConfigManager.fromFile(`${dir.path}/missing.json`, {})).rejects.toBeInstanceOf(
        ConfigurationError
      );
    });
  });
});
