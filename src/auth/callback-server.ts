import { createServer, type ServerResponse } from "node:http";
import { AuthorizationError } from "../utils/errors.js";

export const CALLBACK_PATH = "/oauth/callback";
const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;

export interface CallbackServer {
  /** Port actually bound (differs from the requested one only for port 0). */
  port: number;
  /** Settles on the first redirect carrying a code or an error, or on timeout. */
  code: Promise<string>;
  close(): void;
}

/**
 * Listen for Google's redirect on localhost. Resolves once the port is bound,
 * so a busy port surfaces as a rejection of this call; the timeout only
 * starts counting after that.
 */
export function startCallbackServer(
  port: number,
  timeoutMs: number = DEFAULT_TIMEOUT_MS
): Promise<CallbackServer> {
  let resolveCode: (code: string) => void = () => undefined;
  let rejectCode: (err: Error) => void = () => undefined;
  const code = new Promise<string>((resolve, reject) => {
    resolveCode = resolve;
    rejectCode = reject;
  });

  let timer: NodeJS.Timeout | undefined;
  const server = createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    if (url.pathname !== CALLBACK_PATH) {
      reply(res, 404, "Not found");
      return;
    }

    const denied = url.searchParams.get("error");
    const received = url.searchParams.get("code");
    if (denied) {
      reply(res, 400, "Authorization failed. You can close this window.");
      close();
      rejectCode(new AuthorizationError(`OAuth authorization denied: ${denied}`));
    } else if (received) {
      reply(res, 200, "Authorization complete. You can close this window and return to the terminal.");
      close();
      resolveCode(received);
    } else {
      reply(res, 400, "Missing authorization code");
    }
  });

  let closed = false;
  function close(): void {
    if (closed) return;
    closed = true;
    clearTimeout(timer);
    server.close();
  }

  return new Promise<CallbackServer>((resolve, reject) => {
    let listening = false;

    server.on("error", (err) => {
      if (!listening) {
        reject(new AuthorizationError(`Could not listen for the OAuth redirect on port ${port}: ${err.message}`, { cause: err }));
        return;
      }
      close();
      rejectCode(new AuthorizationError(`OAuth callback server failed: ${err.message}`, { cause: err }));
    });

    server.listen(port, () => {
      listening = true;
      timer = setTimeout(() => {
        close();
        rejectCode(new AuthorizationError(`OAuth callback timed out after ${Math.round(timeoutMs / 1000)} seconds`));
      }, timeoutMs);

      const address = server.address();
      resolve({
        port: typeof address === "object" && address ? address.port : port,
        code,
        close,
      });
    });
  });
}

function reply(res: ServerResponse, status: number, message: string): void {
  res.writeHead(status, { "Content-Type": "text/plain; charset=utf-8", Connection: "close" });
  res.end(message);
}
