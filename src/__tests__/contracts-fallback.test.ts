import { clearConfigCache, findStrRefConfig, getContractsConfig, loadStrRefConfig } from '../utils/config';
import { getContractPolicy } from '../utils/contracts';

// No config file can be found in this suite
jest.mock('fs', () => ({
  ...jest.requireActual<typeof import('fs')>('fs'),
  existsSync: jest.fn(() => false),
}));

describe('contracts without a config file', () => {
  const envPolicy = process.env.STRREF_CONTRACT_POLICY;

  beforeEach(() => {
    clearConfigCache();
    delete process.env.STRREF_CONTRACT_POLICY;
  });

  afterEach(() => {
    process.env.STRREF_CONTRACT_POLICY = envPolicy;
  });

  it('should report the missing file from loadStrRefConfig', () => {
    expect(findStrRefConfig()).toBeNull();
    expect(() => loadStrRefConfig()).toThrow('strref config file not found');
  });

  it('should default the policy to abort', () => {
    expect(getContractsConfig()).toEqual({ policy: 'abort' });
    expect(getContractPolicy()).toBe('abort');
  });

  it('should still honour STRREF_CONTRACT_POLICY', () => {
    process.env.STRREF_CONTRACT_POLICY = 'throw';

    expect(getContractPolicy()).toBe('throw');
  });
});
