import type { Server } from "node:http";
import type { Socket } from "node:net";
import { createApiServer } from "./http/createServer.js";
import type { Context } from "./types.js";

export type AppServer = {
  server: Server;
  start: () => Promise<void>;
  stop: () => Promise<void>;
  getContext: () => Context;
};

export async function createServer(context: Context): Promise<AppServer> {
  const server = createApiServer(context);
  const sockets = new Set<Socket>();
  server.on("connection", (s) => {
    sockets.add(s);
    s.on("close", () => sockets.delete(s));
  });

  const start = async () => {
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(context.config.port, () => {
        server.off("error", reject);
        resolve();
      });
    });
  };

  const stop = async () => {
    if (server.listening) {
      const closed = new Promise<void>((resolve) => {
        server.close(() => resolve());
      });
      for (const s of sockets) s.destroy();
      await closed;
    }
    await context.destroy();
  };

  return {
    getContext: () => context,
    server,
    start,
    stop,
  };
}
