import http from "node:http";

import { createControlRouter, type ControlRouterOptions } from "./router.js";

// =============================================================================
// TYPES
// =============================================================================

export type StartControlServerOptions = ControlRouterOptions & {
  port?: number;
};

export type ControlServerHandle = {
  url: string;
  port: number;
  close: () => Promise<void>;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function startControlServer(
  options: StartControlServerOptions,
): Promise<ControlServerHandle> {
  const port = options.port ?? 0;
  if (!Number.isInteger(port) || port < 0) {
    throw new Error("Port must be a non-negative integer.");
  }

  const router = createControlRouter(options);
  const server = http.createServer((req, res) => router(req, res));
  await listenOnLocalhost(server, port);

  const address = server.address();
  if (!address || typeof address === "string") {
    await closeServer(server);
    throw new Error("Unable to determine control server address.");
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    port: address.port,
    close: () => closeServer(server),
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function listenOnLocalhost(server: http.Server, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      server.off("error", onError);
      reject(err);
    };

    server.once("error", onError);
    server.listen({ host: "127.0.0.1", port }, () => {
      server.off("error", onError);
      resolve();
    });
  });
}

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) {
        reject(err);
        return;
      }
      resolve();
    });
    server.closeAllConnections();
  });
}
