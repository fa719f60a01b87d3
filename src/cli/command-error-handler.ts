import chalk from 'chalk';
import {
  ConfigurationError,
  RemoteError,
  UnknownBrokerError,
  ValidationError,
} from '../errors.js';
import { ConfigLoadError } from '../config/loader.js';

/**
 * Render an error for the terminal, one line per fact.
 */
export function describeCommandError(err: unknown): string[] {
  if (err instanceof ValidationError) {
    return [chalk.red(`Invalid query: ${err.message}`)];
  }
  if (err instanceof UnknownBrokerError) {
    return [chalk.red(`Error: ${err.message}`)];
  }
  if (err instanceof RemoteError) {
    const lines = [chalk.red(`Broker request failed: ${err.message}`), chalk.yellow(`  url: ${err.url}`)];
    if (err.timedOut) lines.push(chalk.yellow('  the request timed out; retry later or raise timeoutMs'));
    return lines;
  }
  if (err instanceof ConfigurationError) {
    const lines = [chalk.red(`Taxonomy configuration error: ${err.message}`)];
    if (err.chain.length > 0) lines.push(chalk.yellow(`  chain: ${err.chain.join(' -> ')}`));
    return lines;
  }
  if (err instanceof ConfigLoadError) {
    return [chalk.red(`Error: ${err.message}`)];
  }
  const msg = err instanceof Error ? err.message : String(err);
  return [chalk.red(`Error: ${msg}`)];
}

/**
 * Centralized error handler for CLI command actions.
 */
export function handleCommandError(err: unknown): never {
  for (const line of describeCommandError(err)) {
    console.error(line);
  }
  process.exit(1);
}

/**
 * Wrap an async commander action handler with standardized error handling.
 */
export function withCommandHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      handleCommandError(err);
    }
  };
}
