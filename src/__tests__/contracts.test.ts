import { StringRef } from '../adt/string-ref';
import { ContractViolationError, check, getContractPolicy, panic, setContractPolicy } from '../utils/contracts';
import { clearConfigCache } from '../utils/config';

describe('contracts', () => {
  afterEach(() => {
    setContractPolicy(null);
    jest.restoreAllMocks();
  });

  describe('policy', () => {
    it('should take the policy from STRREF_CONTRACT_POLICY', () => {
      expect(getContractPolicy()).toBe('throw');
    });

    it('should fall back to config/strref.json', () => {
      const envPolicy = process.env.STRREF_CONTRACT_POLICY;
      delete process.env.STRREF_CONTRACT_POLICY;
      clearConfigCache();
      try {
        expect(getContractPolicy()).toBe('abort');
      } finally {
        process.env.STRREF_CONTRACT_POLICY = envPolicy;
      }
    });

    it('should prefer an explicit override', () => {
      setContractPolicy('abort');
      expect(getContractPolicy()).toBe('abort');

      setContractPolicy(null);
      expect(getContractPolicy()).toBe('throw');
    });
  });

  describe('check', () => {
    it('should pass when the condition holds', () => {
      expect(() => check(true, 'unused')).not.toThrow();
    });

    it('should point at the violating call site', () => {
      let caught: unknown;
      try {
        new StringRef('abc').dropFront(4);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ContractViolationError);
      if (caught instanceof ContractViolationError) {
        expect(caught.location).toMatch(/^string-ref\.ts:\d+$/);
        expect(caught.message).toContain('Dropping more characters than exist.');
      }
    });
  });

  describe('abort policy', () => {
    it('should report the violation and abort', () => {
      setContractPolicy('abort');
      const abort = jest.spyOn(process, 'abort').mockImplementation(() => {
        throw new Error('aborted');
      });
      const stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);

      expect(() => panic('broken invariant')).toThrow('aborted');
      expect(abort).toHaveBeenCalledTimes(1);
      expect(stderr).toHaveBeenCalledTimes(1);
      expect(String(stderr.mock.calls[0][0])).toMatch(/\[PANIC\] contracts\.test\.ts:\d+ broken invariant, abort\./);
    });
  });
});
