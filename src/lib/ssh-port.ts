import { connect } from "node:net";

export type PortState = "open" | "closed";

/** TCP connect check; resolves "closed" on refusal or timeout. */
export function checkPort(host: string, port = 22, timeoutMs = 2_000): Promise<PortState> {
  return new Promise((resolve) => {
    const socket = connect({ host, port });
    const finish = (result: PortState) => {
      socket.destroy();
      resolve(result);
    };
    socket.setTimeout(timeoutMs);
    socket.once("connect", () => finish("open"));
    socket.once("timeout", () => finish("closed"));
    socket.once("error", () => finish("closed"));
  });
}
