import { Logger } from '@nestjs/common';

type LoggerMethod = 'log' | 'warn' | 'error' | 'debug';

/**
 * Silences NestJS Logger output for noisy test scenarios.
 * Returns a restore function to reinstate original behavior.
 */
export function silenceNestLogger(methods: readonly LoggerMethod[] = ['warn', 'error']): () => void {
  const spies = methods.map((method) => jest.spyOn(Logger.prototype, method).mockImplementation(() => undefined));

  return () => {
    spies.forEach((spy) => spy.mockRestore());
  };
}
