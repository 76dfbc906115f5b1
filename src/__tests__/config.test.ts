import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import {
  assertDestinationAvailable,
  assertNodeVersion,
  assertSourceExists,
  loadConfig,
  validateLanguageCode,
} from '../utils/config';
import { ConfigurationError } from '../utils/errors';

describe('config', () => {
  let workDir: string;
  let configPath: string;
  const savedKey = process.env.OPENAI_API_KEY;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sitelingo-config-'));
    configPath = path.join(workDir, 'sitelingo.config.json');
    delete process.env.OPENAI_API_KEY;
  });

  afterEach(async () => {
    await fs.remove(workDir);
    if (savedKey === undefined) {
      delete process.env.OPENAI_API_KEY;
    } else {
      process.env.OPENAI_API_KEY = savedKey;
    }
  });

  describe('loadConfig', () => {
    it('should apply defaults', async () => {
      await fs.writeJson(configPath, {});

      const config = await loadConfig({
        config: configPath,
        src: './site',
        dest: './out',
        fromLang: 'en',
        toLang: 'pt',
      });

      expect(config).toEqual({
        src: './site',
        dest: './out',
        fromLang: 'en',
        toLang: 'pt',
        includeMarkdown: false,
        translateJs: false,
        openaiModel: 'gpt-4o-mini',
        ignorePaths: [],
      });
    });

    it('should let CLI flags override the config file', async () => {
      await fs.writeJson(configPath, {
        fromLang: 'en',
        toLang: 'fr',
        includeMarkdown: true,
        openaiModel: 'gpt-4o',
        ignorePaths: ['vendor/**'],
      });

      const config = await loadConfig({
        config: configPath,
        src: './site',
        dest: './out',
        toLang: 'de',
        model: 'gpt-4o-mini',
      });

      expect(config.fromLang).toBe('en');
      expect(config.toLang).toBe('de');
      expect(config.includeMarkdown).toBe(true);
      expect(config.openaiModel).toBe('gpt-4o-mini');
      expect(config.ignorePaths).toEqual(['vendor/**']);
    });

    it('should require exactly one of src and repoUrl', async () => {
      await fs.writeJson(configPath, {});
      const base = { config: configPath, dest: './out', fromLang: 'en', toLang: 'pt' };

      await expect(loadConfig(base)).rejects.toThrow(
        'Invalid configuration:\n  - src: exactly one of --src or --repo-url is required'
      );
      await expect(
        loadConfig({ ...base, src: './site', repoUrl: 'https://example.com/site.git' })
      ).rejects.toThrow(ConfigurationError);
    });

    it('should fail on a missing explicit config file', async () => {
      const missing = path.join(workDir, 'nope.json');

      await expect(loadConfig({ config: missing })).rejects.toThrow(
        `Configuration file not found: ${missing}`
      );
    });

    it('should reject invalid values in the config file', async () => {
      await fs.writeJson(configPath, { includeMarkdown: 'yes' });

      await expect(loadConfig({ config: configPath })).rejects.toThrow(/^Invalid configuration in /);
    });

    it('should take the API key from the environment when none is configured', async () => {
      await fs.writeJson(configPath, {});
      process.env.OPENAI_API_KEY = 'test-key';

      const config = await loadConfig({
        config: configPath,
        repoUrl: 'https://example.com/site.git',
        dest: './out',
        fromLang: 'en',
        toLang: 'pt',
      });

      expect(config.openaiApiKey).toBe('test-key');
    });

    it('should prefer a configured API key over the environment', async () => {
      await fs.writeJson(configPath, { openaiApiKey: 'file-key' });
      process.env.OPENAI_API_KEY = 'test-key';

      const config = await loadConfig({
        config: configPath,
        src: './site',
        dest: './out',
        fromLang: 'en',
        toLang: 'pt',
      });

      expect(config.openaiApiKey).toBe('file-key');
    });
  });

  describe('assertDestinationAvailable', () => {
    it('should accept a missing or empty destination', async () => {
      await expect(assertDestinationAvailable(path.join(workDir, 'new'))).resolves.toBeUndefined();
      await fs.ensureDir(path.join(workDir, 'empty'));
      await expect(assertDestinationAvailable(path.join(workDir, 'empty'))).resolves.toBeUndefined();
    });

    it('should refuse a non-empty destination', async () => {
      const dest = path.join(workDir, 'out');
      await fs.outputFile(path.join(dest, 'index.html'), '<p>old</p>');

      await expect(assertDestinationAvailable(dest)).rejects.toThrow(
        `Destination ${dest} already exists and is not empty.`
      );
    });

    it('should refuse a destination that is a file', async () => {
      await expect(assertDestinationAvailable(configPath)).resolves.toBeUndefined();
      await fs.writeFile(configPath, '{}');

      await expect(assertDestinationAvailable(configPath)).rejects.toThrow(
        `Destination ${configPath} exists and is not a directory.`
      );
    });
  });

  describe('assertSourceExists', () => {
    it('should fail for a missing source', async () => {
      const src = path.join(workDir, 'missing');
      await expect(assertSourceExists(src)).rejects.toThrow(`Source path not found: ${src}`);
      await expect(assertSourceExists(workDir)).resolves.toBeUndefined();
    });
  });

  describe('assertNodeVersion', () => {
    it('should accept Node.js 20 and newer', () => {
      expect(() => assertNodeVersion('20.11.1')).not.toThrow();
      expect(() => assertNodeVersion('22.0.0')).not.toThrow();
    });

    it('should reject older runtimes', () => {
      expect(() => assertNodeVersion('18.19.0')).toThrow('Node.js 20 or newer is required (running 18.19.0)');
    });
  });

  describe('validateLanguageCode', () => {
    it('should accept two-letter codes with an optional region', () => {
      expect(validateLanguageCode('en')).toBe(true);
      expect(validateLanguageCode('pt-BR')).toBe(true);
      expect(validateLanguageCode('english')).toBe(false);
      expect(validateLanguageCode('PT')).toBe(false);
    });
  });
});
