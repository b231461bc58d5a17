// src/utils/listen.ts
import type { Express } from "express";
import type { Server } from "http";

// Resolves once bound; rejects on EADDRINUSE, EACCES and friends
export function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      resolve(server);
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

export function serverUrl(server: Server): string {
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server is not listening on a TCP port");
  }
  const { address: host, port, family } = address;
  return family === "IPv6" ? `http://[${host}]:${port}` : `http://${host}:${port}`;
}
