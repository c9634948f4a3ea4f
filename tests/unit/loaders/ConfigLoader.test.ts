import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadConfig } from '../../../src/loaders/ConfigLoader';
import { ConfigParseError } from '../../../src/errors';

describe('loadConfig', () => {
  let tmpDir: string;

  const writeConfig = (contents: string): string => {
    const configPath = path.join(tmpDir, 'config.yaml');
    fs.writeFileSync(configPath, contents);
    return configPath;
  };

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'domain-scout-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  test('should read top_level_domains in document order', () => {
    const configPath = writeConfig('top_level_domains:\n  - com\n  - net\n  - org\n');

    expect(loadConfig(configPath)).toEqual(['com', 'net', 'org']);
  });

  test('should return an empty list when the file is missing', () => {
    expect(loadConfig(path.join(tmpDir, 'nonexistent.yaml'))).toEqual([]);
  });

  test('should return an empty list for an empty document', () => {
    expect(loadConfig(writeConfig(''))).toEqual([]);
  });

  test('should return an empty list when the key is absent', () => {
    expect(loadConfig(writeConfig('other_setting: true\n'))).toEqual([]);
  });

  test('should return an empty list when the key has no value', () => {
    expect(loadConfig(writeConfig('top_level_domains:\n'))).toEqual([]);
  });

  test('should keep duplicates', () => {
    expect(loadConfig(writeConfig('top_level_domains: [com, com]\n'))).toEqual(['com', 'com']);
  });

  test('should throw ConfigParseError for syntactically invalid YAML', () => {
    const configPath = writeConfig('top_level_domains: [com, net\n');

    expect(() => loadConfig(configPath)).toThrow(ConfigParseError);
    expect(() => loadConfig(configPath)).toThrow(`Invalid configuration in ${configPath}:`);
  });

  test('should throw when top_level_domains is not a list', () => {
    const configPath = writeConfig('top_level_domains: com\n');

    expect(() => loadConfig(configPath)).toThrow(
      new ConfigParseError(configPath, 'top_level_domains must be a list of strings')
    );
  });

  test('should throw when a TLD entry is not a string', () => {
    const configPath = writeConfig('top_level_domains:\n  - com\n  - 42\n');

    expect(() => loadConfig(configPath)).toThrow(ConfigParseError);
  });

  test('should throw when the document is not a mapping', () => {
    const configPath = writeConfig('- com\n- net\n');

    expect(() => loadConfig(configPath)).toThrow(
      new ConfigParseError(configPath, 'expected a mapping at the top level')
    );
  });

  test('should propagate read errors other than a missing file', () => {
    let caught: unknown;
    try {
      loadConfig(tmpDir);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(Error);
    expect(caught).not.toBeInstanceOf(ConfigParseError);
  });
});
