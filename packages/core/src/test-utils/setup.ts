import fc from 'fast-check';

// Property tests run with a fixed seed so failures replay; FC_NUM_RUNS and
// TEST_SEED come from vitest.config.ts and may be overridden from the shell.
function readPositiveInt(name: string, fallback: number): number {
  const parsed = Number(process.env[name]);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : fallback;
}

fc.configureGlobal({
  numRuns: readPositiveInt('FC_NUM_RUNS', 100),
  seed: readPositiveInt('TEST_SEED', 424242),
});
