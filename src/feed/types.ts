export interface PriceTick {
  timestamp: number;
  price: number;
}

export interface FeedEvents {
  tick: (tick: PriceTick) => void;
  stale: (lastTickAt: number | null) => void;
  fresh: () => void;
  connected: () => void;
  disconnected: () => void;
  error: (err: Error) => void;
}

export interface FeedOptions {
  url: string;
  productId: string;
  staleAfterMs: number;
  reorderWindowMs: number;
  reconnectBaseMs: number;
  maxBackoffMs: number;
  connectTimeoutMs: number;
}
