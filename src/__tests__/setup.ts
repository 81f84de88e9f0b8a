// [NOTE]: Contract violations throw in tests instead of aborting the runner
process.env.STRREF_CONTRACT_POLICY = 'throw';
