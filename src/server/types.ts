import type { CardSnapshot } from '../types.js';

// Request metadata attached by middleware
export interface RequestMetadata {
  request_id: string;
}

// Body of GET /api/card
export type CardStatusResponse = Omit<CardSnapshot, 'history'>;

export interface ActivationFailureResponse {
  error: string;
  kind: string;
}
