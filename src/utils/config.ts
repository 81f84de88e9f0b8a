import * as fs from 'fs';
import * as path from 'path';

export type ContractPolicy = 'abort' | 'throw';
export type OutputFormat = 'text' | 'json';

// [NOTE]: How contract violations end (see utils/contracts)
export interface ContractsConfig {
  policy: ContractPolicy;
}

// [NOTE]: Defaults for the `suggest` command
export interface SuggestConfig {
  maxDistance: number;
  maxResults: number;
  caseSensitive: boolean;
}

// [NOTE]: Defaults for the `scan` command
export interface ScanConfig {
  wholeWord: boolean;
  maxFileBytes: number;   // Files larger than this are skipped
}

export interface OutputConfig {
  format: OutputFormat;
}

// [NOTE]: Settings loaded from config/strref.json
export interface StrRefConfig {
  contracts: ContractsConfig;
  encoding: BufferEncoding;
  suggest: SuggestConfig;
  scan: ScanConfig;
  output: OutputConfig;
}

let cachedConfig: StrRefConfig | null = null;

// [NOTE]: Same as loadStrRefConfig(), null when no config file exists
export function findStrRefConfig(): StrRefConfig | null {
  if (cachedConfig) {
    return cachedConfig;
  }

  // [NOTE]: Allow override via environment variable
  const customPath = process.env.STRREF_CONFIG;

  const configPaths = [
    customPath,
    path.join(process.cwd(), 'config', 'strref.json'),          // Project root
    path.join(__dirname, '..', '..', 'config', 'strref.json'),  // src/utils or dist/utils -> config
  ].filter((p): p is string => Boolean(p));

  for (const configPath of configPaths) {
    try {
      if (fs.existsSync(configPath)) {
        const rawConfig = fs.readFileSync(configPath, 'utf-8');
        cachedConfig = JSON.parse(rawConfig) as StrRefConfig;
        return cachedConfig;
      }
    } catch (error) {
      // [NOTE]: Continue to next path if parsing fails
      console.error('Failed to parse config at %s:', configPath, error);
    }
  }
  return null;
}

// [!IMPORTANT]: Load settings from JSON file - single source of defaults
export function loadStrRefConfig(): StrRefConfig {
  const config = findStrRefConfig();
  if (config) {
    return config;
  }

  throw new Error(
    'strref config file not found. Expected at config/strref.json\n' +
    'You can also set STRREF_CONFIG environment variable to specify a custom path.'
  );
}

// [NOTE]: Clear cached config (useful for testing or reloading)
export function clearConfigCache(): void {
  cachedConfig = null;
}

function isContractPolicy(value: string | undefined): value is ContractPolicy {
  return value === 'abort' || value === 'throw';
}

// [NOTE]: STRREF_CONTRACT_POLICY wins over the file; without either, violations abort
export function getContractsConfig(): ContractsConfig {
  const envPolicy = process.env.STRREF_CONTRACT_POLICY;
  if (isContractPolicy(envPolicy)) {
    return { policy: envPolicy };
  }
  const config = findStrRefConfig();
  return config?.contracts || { policy: 'abort' };
}

export function getEncoding(): BufferEncoding {
  const config = loadStrRefConfig();
  return config.encoding || 'utf8';
}

export function getSuggestConfig(): SuggestConfig {
  const config = loadStrRefConfig();
  return config.suggest || {
    maxDistance: 2,
    maxResults: 5,
    caseSensitive: false,
  };
}

export function getScanConfig(): ScanConfig {
  const config = loadStrRefConfig();
  return config.scan || {
    wholeWord: false,
    maxFileBytes: 16 * 1024 * 1024,
  };
}

export function getOutputConfig(): OutputConfig {
  const config = loadStrRefConfig();
  return config.output || { format: 'text' };
}
