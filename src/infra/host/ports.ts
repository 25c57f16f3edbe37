/**
 * TCP port availability on the local host.
 */

import { createServer } from 'node:net';
import { Success, Failure, type Result } from '@/types';
import { extractErrorCode, extractErrorMessage } from '@/lib/error-utils';

/**
 * Check whether something already listens on `port`.
 *
 * Binds a throwaway listener on all interfaces; EADDRINUSE means the port is
 * taken. Other bind errors are returned as failures.
 */
export function isPortInUse(port: number): Promise<Result<boolean>> {
  return new Promise((resolve) => {
    const server = createServer();

    server.once('error', (error: Error) => {
      if (extractErrorCode(error) === 'EADDRINUSE') {
        resolve(Success(true));
        return;
      }
      resolve(
        Failure(`Cannot check port ${port}: ${extractErrorMessage(error)}`, {
          message: `Cannot check port ${port}: ${extractErrorMessage(error)}`,
          hint: 'Binding a test listener on the port failed',
          resolution: 'Verify you are allowed to open listening sockets on this host.',
          details: { port, code: extractErrorCode(error) },
        }),
      );
    });

    server.once('listening', () => {
      server.close(() => resolve(Success(false)));
    });

    server.listen({ port, exclusive: true });
  });
}
