export interface TcpLineMetrics {
  connects: number;
  requestsSent: number;
  repliesReceived: number;
  parseErrors: number;
  lastError?: string;
  lastReplyAt?: string;
}

export interface TcpLineStatus {
  state: "DISCONNECTED" | "CONNECTING" | "CONNECTED";
  metrics: TcpLineMetrics;
}
