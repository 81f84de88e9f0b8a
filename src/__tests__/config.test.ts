import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  loadStrRefConfig,
  clearConfigCache,
  getEncoding,
  getSuggestConfig,
  getScanConfig,
  getOutputConfig,
} from '../utils/config';

describe('Config', () => {
  beforeEach(() => {
    clearConfigCache();
  });

  describe('loadStrRefConfig', () => {
    it('should load config from strref.json', () => {
      const config = loadStrRefConfig();

      expect(config.contracts.policy).toBe('abort');
      expect(config.suggest).toBeDefined();
      expect(config.scan).toBeDefined();
      expect(config.output).toBeDefined();
    });

    it('should cache config on subsequent calls', () => {
      const config1 = loadStrRefConfig();
      const config2 = loadStrRefConfig();

      expect(config1).toBe(config2);
    });

    it('should return fresh config after clearing cache', () => {
      const config1 = loadStrRefConfig();
      clearConfigCache();
      const config2 = loadStrRefConfig();

      expect(config1).not.toBe(config2);
      expect(config1).toEqual(config2);
    });

    it('should read the file named by STRREF_CONFIG', () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'strref-config-'));
      const file = path.join(dir, 'custom.json');
      fs.writeFileSync(file, JSON.stringify({ ...loadStrRefConfig(), encoding: 'latin1' }));
      clearConfigCache();

      process.env.STRREF_CONFIG = file;
      try {
        expect(getEncoding()).toBe('latin1');
      } finally {
        delete process.env.STRREF_CONFIG;
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  describe('section getters', () => {
    it('should return the shipped defaults', () => {
      expect(getEncoding()).toBe('utf8');
      expect(getSuggestConfig()).toEqual({ maxDistance: 2, maxResults: 5, caseSensitive: false });
      expect(getScanConfig()).toEqual({ wholeWord: false, maxFileBytes: 16777216 });
      expect(getOutputConfig().format).toBe('text');
    });
  });
});
