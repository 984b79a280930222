// Logger that records instead of printing

export function createMockLogger() {
  return {
    log: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  };
}

export type MockLogger = ReturnType<typeof createMockLogger>;
