import { readFileSync } from 'node:fs';
import { setupServer } from 'msw/node';

/**
 * Stand-in for the Doc API. Tests install handlers with `server.use()`;
 * anything unhandled fails the test.
 */
export const server = setupServer();

export function startDocApiServer(): void {
  server.listen({ onUnhandledRequest: 'error' });
}

export function stopDocApiServer(): void {
  server.close();
}

export function resetDocApiHandlers(): void {
  server.resetHandlers();
}

/** Raw text of a fixture under tests/fixtures. */
export function readFixture(name: string): string {
  return readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf-8');
}
