import { describe, it, expect } from '@jest/globals';
import { createServer, type Server } from 'node:net';
import { isPortInUse } from '@/infra/host/ports';

function listen(server: Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen({ port: 0 }, () => {
      const address = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : 0);
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe('isPortInUse', () => {
  it('should report a port held by a listener', async () => {
    const server = createServer();
    const port = await listen(server);
    try {
      expect(await isPortInUse(port)).toEqual({ ok: true, value: true });
    } finally {
      await close(server);
    }
  });

  it('should report a released port as free', async () => {
    const server = createServer();
    const port = await listen(server);
    await close(server);

    expect(await isPortInUse(port)).toEqual({ ok: true, value: false });
  });
});
