import net from "node:net";
import { TcpLineError } from "./errors";
import { LineSplitter, parseReply } from "./parser";
import type { TcpLineReply, TcpLineRequest } from "./parser";

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export interface LineConnectionHooks {
  onReply?: () => void;
  onParseError?: (line: string, error: unknown) => void;
  onClose?: (connection: LineConnection) => void;
}

/** One open socket to a device, matching newline-delimited replies to requests by id. */
export class LineConnection {
  private readonly splitter = new LineSplitter();
  private readonly pending = new Map<number, PendingRequest>();
  private closed = false;

  private constructor(
    private readonly socket: net.Socket,
    private readonly hooks: LineConnectionHooks
  ) {
    socket.setEncoding("utf8");
    socket.on("data", (chunk: string) => this.handleData(chunk));
    socket.on("error", (error: Error) => this.failPending(new TcpLineError(error.message, { cause: error })));
    socket.on("close", () => this.handleClose());
  }

  static open(host: string, port: number, timeoutMs: number, hooks: LineConnectionHooks = {}): Promise<LineConnection> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port });
      const onError = (error: Error): void => {
        clearTimeout(timer);
        reject(new TcpLineError(`Connection to ${host}:${String(port)} failed: ${error.message}`, { cause: error }));
      };
      const timer = setTimeout(() => {
        socket.removeListener("error", onError);
        socket.destroy();
        reject(new TcpLineError(`Connection to ${host}:${String(port)} timed out after ${String(timeoutMs)}ms`));
      }, timeoutMs);
      socket.once("error", onError);
      socket.once("connect", () => {
        clearTimeout(timer);
        socket.removeListener("error", onError);
        resolve(new LineConnection(socket, hooks));
      });
    });
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  request(request: TcpLineRequest, timeoutMs: number): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(new TcpLineError("Connection closed"));
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(request.id);
        reject(new TcpLineError(`Request ${String(request.id)} (${request.method}) timed out after ${String(timeoutMs)}ms`));
      }, timeoutMs);
      this.pending.set(request.id, { resolve, reject, timer });
      this.socket.write(`${JSON.stringify(request)}\n`);
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    await new Promise<void>((resolve) => {
      this.socket.once("close", () => resolve());
      this.socket.destroy();
    });
  }

  private handleData(chunk: string): void {
    for (const line of this.splitter.push(chunk)) {
      let reply: TcpLineReply;
      try {
        reply = parseReply(line);
      } catch (error) {
        this.hooks.onParseError?.(line, error);
        continue;
      }
      const pending = this.pending.get(reply.id);
      if (!pending) continue;
      this.pending.delete(reply.id);
      clearTimeout(pending.timer);
      this.hooks.onReply?.();
      if ("error" in reply) {
        pending.reject(new TcpLineError(reply.error.message));
      } else {
        pending.resolve(reply.result);
      }
    }
  }

  private handleClose(): void {
    this.closed = true;
    this.failPending(new TcpLineError("Connection closed"));
    this.hooks.onClose?.(this);
  }

  private failPending(error: Error): void {
    for (const pending of this.pending.values()) {
      clearTimeout(pending.timer);
      pending.reject(error);
    }
    this.pending.clear();
  }
}
