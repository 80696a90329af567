export interface ClueCandidate {
  readonly title: string;
  readonly audioUrl: string;
  readonly imageUrl: string;
}

/** Looks up playable media for a film title. May reject or return nothing. */
export interface ClueProvider {
  search(title: string, signal?: AbortSignal): Promise<readonly ClueCandidate[]>;
}
