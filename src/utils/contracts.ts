import chalk from 'chalk';
import * as path from 'path';
import { ContractPolicy, getContractsConfig } from './config';

// [!IMPORTANT]: Contract violations are programmer errors, never "not found" results.
// `abort` reports and ends the process, `throw` raises ContractViolationError.

export class ContractViolationError extends Error {
  readonly location: string;

  constructor(message: string, location: string) {
    super(`${message} (at ${location})`);
    this.name = 'ContractViolationError';
    this.location = location;
  }
}

let policyOverride: ContractPolicy | null = null;

// [NOTE]: Pass null to fall back to STRREF_CONTRACT_POLICY / config/strref.json
export function setContractPolicy(policy: ContractPolicy | null): void {
  policyOverride = policy;
}

export function getContractPolicy(): ContractPolicy {
  return policyOverride ?? getContractsConfig().policy;
}

const FRAME_PATTERN = /\(?([^\s()]+):(\d+):\d+\)?$/;

// [NOTE]: First stack frame outside this file, as "file:line"
function callerLocation(): string {
  const frames = (new Error().stack ?? '').split('\n').slice(1);
  for (const frame of frames) {
    const match = FRAME_PATTERN.exec(frame.trim());
    if (match && match[1] !== __filename) {
      return `${path.basename(match[1])}:${match[2]}`;
    }
  }
  return '<unknown>';
}

export function panic(message: string): never {
  const location = callerLocation();
  if (getContractPolicy() === 'throw') {
    throw new ContractViolationError(message, location);
  }
  console.error(chalk.red(`[PANIC] ${location} ${message}, abort.`));
  return process.abort();
}

export function check(condition: boolean, message: string): asserts condition {
  if (!condition) {
    panic(message);
  }
}
