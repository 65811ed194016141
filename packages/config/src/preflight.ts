import net from "node:net";

export type PreflightResult = { ok: true } | { ok: false; error: string; hint?: string };

/**
 * Bind the port once before the real server does, so startup fails with a
 * readable hint instead of an unhandled 'error' event.
 */
export async function preflightListen(host: string, port: number): Promise<PreflightResult> {
  return await new Promise((resolve) => {
    const srv = net.createServer();
    const onError = (err: NodeJS.ErrnoException) => {
      const code = String(err.code ?? "ERR");
      if (code === "EACCES") {
        resolve({
          ok: false,
          error: "permission_denied",
          hint: `Cannot bind ${host}:${port} (EACCES). The port may be reserved; try a port above 1024.`
        });
      } else if (code === "EADDRINUSE") {
        resolve({
          ok: false,
          error: "port_in_use",
          hint: `Port ${port} is already in use. Set PORT or server.port to another port.`
        });
      } else if (code === "EADDRNOTAVAIL") {
        resolve({
          ok: false,
          error: "host_unavailable",
          hint: `Host ${host} is not available on this machine.`
        });
      } else {
        resolve({
          ok: false,
          error: code,
          hint: `Cannot bind ${host}:${port} (${code}).`
        });
      }
    };

    srv.once("error", onError);
    srv.listen({ host, port }, () => {
      srv.close(() => resolve({ ok: true }));
    });
  });
}
