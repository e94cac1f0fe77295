export interface ChatSession {
  id: string;
  title: string;
  createdAt: Date;
  updatedAt: Date;
}

export type TurnRole = "user" | "assistant";

export interface ConversationTurn {
  role: TurnRole;
  text: string;
  citedChunkIds?: string[];
  createdAt: Date;
}

export interface Citation {
  documentId: string;
  documentName: string;
  chunkId: string;
  excerpt: string;
  score: number;
}

export interface Answer {
  text: string;
  citations: Citation[];
  /** False when nothing was retrieved and the fixed "no information" reply was returned. */
  grounded: boolean;
}
