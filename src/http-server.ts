import http from 'node:http';
import { createApp } from './app.js';
import type { ServerContext } from './context.js';
import { readErrnoCode } from './errors.js';
import { getLanAddress } from './system-info.js';

export interface BindTarget {
  bindHost: string;
  displayHost: string;
  iface: string | null;
}

export interface RunningServer {
  server: http.Server;
  port: number;
}

export function resolveBindTarget(host: string): BindTarget {
  if (host !== 'auto') {
    return { bindHost: host, displayHost: host, iface: null };
  }
  const lan = getLanAddress();
  if (!lan) {
    return { bindHost: 'localhost', displayHost: 'localhost', iface: null };
  }
  return { bindHost: '0.0.0.0', displayHost: lan.address, iface: lan.iface };
}

export function createFileServer(context: ServerContext): http.Server {
  const server = http.createServer(createApp(context));
  server.on('clientError', (error, socket) => {
    if (readErrnoCode(error) !== 'ECONNRESET' && socket.writable) {
      socket.end('HTTP/1.1 400 Bad Request\r\n\r\n');
      return;
    }
    socket.destroy();
  });
  return server;
}

export function startFileServer(context: ServerContext, bindHost: string, port = context.config.port): Promise<RunningServer> {
  const server = createFileServer(context);
  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => {
      reject(error);
    };
    server.once('error', onError);
    server.listen(port, bindHost, () => {
      server.off('error', onError);
      const address = server.address();
      resolve({ server, port: address && typeof address === 'object' ? address.port : port });
    });
  });
}

export function stopFileServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
    server.closeAllConnections();
  });
}
