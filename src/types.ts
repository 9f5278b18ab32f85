export type CardState = 'UNSCRATCHED' | 'SCRATCHED' | 'ACTIVATED' | 'CANCELLED';

export type Card = {
  code: string | null;
  state: CardState;
  timestamp: number;
};

export type HistoryEntry = {
  readonly code: string | null;
  readonly state: CardState;
  readonly timestamp: number;
};

// Current card plus everything a presentation layer renders from it
export type CardSnapshot = {
  card: Card;
  history: readonly HistoryEntry[];
  error: string | null;
  loading: boolean;
  scratching: boolean;
};
