// Vitest setup file for global test configuration
import { afterEach, vi } from "vitest";

process.env.NODE_ENV = "test";

// Services log through console by default; keep test output quiet
global.console = {
  ...console,
  log: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  info: vi.fn(),
  debug: vi.fn(),
};

afterEach(() => {
  vi.clearAllMocks();
});
