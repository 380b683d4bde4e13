/**
 * Jest setup file.
 * Replace global fetch so no test reaches the network; tests stub it per case.
 */

globalThis.fetch = jest.fn((..._args: Parameters<typeof fetch>) =>
  Promise.reject<Response>(new Error('network access is disabled in tests')),
);

export {};
