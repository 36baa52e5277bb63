import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { JSONRPCMessage } from "@modelcontextprotocol/sdk/types.js";

type RequestId = string | number;

const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * A lightweight HTTP transport for MCP that works with Hono.
 *
 * Bridges individual HTTP requests to the MCP Server's transport interface.
 * Each JSON-RPC request gets a response via a Promise-based dispatch.
 */
export class HttpTransport implements Transport {
  private pendingResponses = new Map<RequestId, (response: JSONRPCMessage) => void>();

  onmessage?: Transport["onmessage"];
  onclose?: () => void;
  onerror?: (error: Error) => void;

  constructor(private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS) {}

  async start(): Promise<void> {
    // No-op, HTTP transport is request-driven
  }

  async close(): Promise<void> {
    for (const [id, resolve] of this.pendingResponses) {
      resolve(errorResponse(id, "Transport closed"));
    }
    this.pendingResponses.clear();
    this.onclose?.();
  }

  async send(message: JSONRPCMessage): Promise<void> {
    // Route the server's response to the waiting HTTP request
    const id = messageId(message);
    if (id === undefined) return; // notifications are dropped in HTTP mode

    const resolver = this.pendingResponses.get(id);
    if (resolver) {
      this.pendingResponses.delete(id);
      resolver(message);
    }
  }

  /**
   * Handle an incoming JSON-RPC message from an HTTP POST.
   * Resolves with the response, or `null` for notifications.
   */
  async handleJsonRpc(body: JSONRPCMessage): Promise<JSONRPCMessage | null> {
    const id = messageId(body);
    if (id === undefined) {
      this.onmessage?.(body);
      return null;
    }

    return new Promise<JSONRPCMessage>((resolve) => {
      const timer = setTimeout(() => {
        if (this.pendingResponses.delete(id)) {
          resolve(errorResponse(id, "Request timed out"));
        }
      }, this.timeoutMs);
      timer.unref?.();

      // Register before dispatch: the server may answer synchronously
      this.pendingResponses.set(id, (response) => {
        clearTimeout(timer);
        resolve(response);
      });

      this.onmessage?.(body);
    });
  }
}

function messageId(message: JSONRPCMessage): RequestId | undefined {
  if (!("id" in message)) return undefined;
  const { id } = message;
  return typeof id === "string" || typeof id === "number" ? id : undefined;
}

function errorResponse(id: RequestId, message: string): JSONRPCMessage {
  return {
    jsonrpc: "2.0",
    id,
    error: { code: -32000, message },
  };
}
