import WebSocket from 'ws';

export interface SocketHandlers {
  onOpen: () => void;
  onMessage: (text: string) => void;
  onClose: (code: number) => void;
  onError: (err: Error) => void;
}

export interface SocketConnection {
  send(data: string): void;
  ping(): void;
  close(): void;
  isOpen(): boolean;
}

export type SocketFactory = (
  url: string,
  handlers: SocketHandlers,
  options?: { headers?: Record<string, string>; handshakeTimeoutMs?: number }
) => SocketConnection;

function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

export const openWebSocket: SocketFactory = (url, handlers, options) => {
  const ws = new WebSocket(url, {
    headers: options?.headers,
    handshakeTimeout: options?.handshakeTimeoutMs,
  });
  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data) => handlers.onMessage(rawToString(data)));
  ws.on('close', (code) => handlers.onClose(code));
  ws.on('error', (err) => handlers.onError(err));

  return {
    send: (data) => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(data);
      }
    },
    ping: () => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.ping();
      }
    },
    close: () => ws.close(),
    isOpen: () => ws.readyState === WebSocket.OPEN,
  };
};
