import fs from 'fs';
import yaml from 'js-yaml';
import { ConfigParseError } from '../errors';

/**
 * Read the TLD list from a YAML configuration document.
 * A missing file, an empty document or an absent key all give an empty list.
 * A document that does not parse, or whose key is not a list of strings,
 * throws ConfigParseError.
 * @param configPath - Path to the YAML document
 * @returns TLDs in document order
 */
export function loadConfig(configPath: string): string[] {
  const contents = readIfExists(configPath);
  if (contents === null) {
    return [];
  }

  let document: unknown;
  try {
    document = yaml.load(contents, { filename: configPath });
  } catch (error) {
    const reason = error instanceof yaml.YAMLException ? error.reason : String(error);
    throw new ConfigParseError(configPath, reason, error);
  }

  if (document === null || document === undefined) {
    return [];
  }
  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new ConfigParseError(configPath, 'expected a mapping at the top level');
  }

  const tlds = 'top_level_domains' in document ? document.top_level_domains : undefined;
  if (tlds === undefined || tlds === null) {
    return [];
  }
  if (!Array.isArray(tlds) || !tlds.every((tld): tld is string => typeof tld === 'string')) {
    throw new ConfigParseError(configPath, 'top_level_domains must be a list of strings');
  }
  return [...tlds];
}

/**
 * Read a UTF-8 file, or null when it does not exist
 */
export function readIfExists(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}
