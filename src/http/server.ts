import { createServer, type Server } from 'node:http';
import type { RequestHandler } from './handler.js';

let server: Server | null = null;

/**
 * Start the API server.
 * Returns the actual port the server is listening on.
 */
export function startApiServer(handler: RequestHandler, port: number, host = '0.0.0.0'): Promise<number> {
  return new Promise((resolve, reject) => {
    const instance = createServer((req, res) => {
      handler(req, res).catch((error: unknown) => {
        console.error('Request failed:', error);
        if (!res.headersSent) {
          res.writeHead(500, { 'Content-Type': 'application/json' });
        }
        res.end();
      });
    });

    instance.on('error', reject);

    instance.listen(port, host, () => {
      server = instance;
      const address = instance.address();
      const actualPort = typeof address === 'object' && address ? address.port : port;
      console.error(`API server listening on http://${host}:${actualPort}`);
      resolve(actualPort);
    });
  });
}

/**
 * Stop the API server.
 */
export function stopApiServer(): Promise<void> {
  return new Promise((resolve) => {
    if (server) {
      server.close(() => {
        server = null;
        resolve();
      });
    } else {
      resolve();
    }
  });
}
