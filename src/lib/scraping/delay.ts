/**
 * Fixed pacing delay between requests
 */
export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) => {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
};
