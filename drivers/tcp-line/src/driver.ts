import { z } from "zod";
import { Device, command } from "@devbridge/driver-core";
import type { CommandTable, JsonValue, SessionState } from "@devbridge/driver-core";
import { ReconnectBackoff } from "./backoff";
import { parseTcpLineAddress, type TcpLineConfig } from "./config";
import { LineConnection } from "./connection";
import { TcpLineError } from "./errors";
import type { TcpLineMetrics, TcpLineStatus } from "./metrics";

const TcpLineStateSchema = z
  .object({
    nextRequestId: z.number().int().positive()
  })
  .partial();

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Device speaking newline-delimited JSON requests over TCP. The socket is
 * opened on the first command and is never part of the session state.
 */
export class TcpLineDevice extends Device {
  static readonly typeName: string = "TcpLineDevice";

  protected readonly config: TcpLineConfig;
  private readonly backoff: ReconnectBackoff;
  private nextRequestId = 1;
  private connection: LineConnection | null = null;
  private connecting: Promise<LineConnection> | null = null;
  /** Bumped by disconnect; a connect that finishes under an older generation is closed. */
  private generation = 0;
  private retryNotBefore = 0;
  private state: TcpLineStatus["state"] = "DISCONNECTED";
  private readonly metrics: TcpLineMetrics = {
    connects: 0,
    requestsSent: 0,
    repliesReceived: 0,
    parseErrors: 0
  };

  constructor(address: string, credential: string) {
    super(address, credential);
    this.config = parseTcpLineAddress(address);
    this.backoff = new ReconnectBackoff(this.config.reconnect);
  }

  commands(): CommandTable {
    return {
      send: command((method, ...params) => this.send(method, params)),
      ping: command([], () => this.send("ping", [])),
      getStatus: command([], () => this.getStatus()),
      disconnect: command([], () => this.disconnect())
    };
  }

  async send(method: string, params: JsonValue[]): Promise<unknown> {
    if (!method) {
      throw new TcpLineError("send requires a method name");
    }
    const connection = await this.ensureConnection();
    const id = this.nextRequestId;
    this.nextRequestId += 1;
    this.metrics.requestsSent += 1;
    try {
      return await connection.request(
        { id, method, params, token: this.credential },
        this.config.requestTimeoutMs
      );
    } catch (error) {
      this.metrics.lastError = error instanceof Error ? error.message : String(error);
      throw error;
    }
  }

  getStatus(): TcpLineStatus {
    return { state: this.state, metrics: { ...this.metrics } };
  }

  async disconnect(): Promise<string> {
    const connection = this.connection;
    const pending = this.connecting;
    this.generation += 1;
    this.connection = null;
    this.state = "DISCONNECTED";
    if (connection) {
      await connection.close();
    }
    if (pending) {
      // The pending connect closes its own socket; its failure belongs to the sender.
      await pending.then(
        () => undefined,
        () => undefined
      );
    }
    return "disconnected";
  }

  async dispose(): Promise<void> {
    await this.disconnect();
  }

  snapshot(): SessionState {
    return { nextRequestId: this.nextRequestId };
  }

  restore(state: SessionState): void {
    const parsed = TcpLineStateSchema.parse(state);
    if (parsed.nextRequestId !== undefined) this.nextRequestId = parsed.nextRequestId;
  }

  private async ensureConnection(): Promise<LineConnection> {
    if (this.connection?.isOpen) {
      return this.connection;
    }
    if (!this.connecting) {
      this.connecting = this.openConnection().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async openConnection(): Promise<LineConnection> {
    const generation = this.generation;
    const wait = this.retryNotBefore - Date.now();
    if (wait > 0) {
      await delay(wait);
    }

    if (generation !== this.generation) {
      throw this.abandoned();
    }

    this.state = "CONNECTING";
    let connection: LineConnection;
    try {
      connection = await LineConnection.open(this.config.host, this.config.port, this.config.requestTimeoutMs, {
        onReply: () => {
          this.metrics.repliesReceived += 1;
          this.metrics.lastReplyAt = new Date().toISOString();
        },
        onParseError: () => {
          this.metrics.parseErrors += 1;
        },
        onClose: (closed) => {
          if (this.connection === closed) {
            this.connection = null;
            this.state = "DISCONNECTED";
          }
        }
      });
    } catch (error) {
      if (generation === this.generation) {
        this.state = "DISCONNECTED";
        this.retryNotBefore = Date.now() + this.backoff.next();
      }
      this.metrics.lastError = error instanceof Error ? error.message : String(error);
      throw error;
    }

    if (generation !== this.generation) {
      await connection.close();
      throw this.abandoned();
    }
    this.connection = connection;
    this.state = "CONNECTED";
    this.metrics.connects += 1;
    this.backoff.reset();
    this.retryNotBefore = 0;
    return connection;
  }

  private abandoned(): TcpLineError {
    return new TcpLineError(`Connection to ${this.config.host}:${String(this.config.port)} closed while connecting`);
  }
}
