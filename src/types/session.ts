import type { ChatMessage } from '../core/types.js';

export interface WaypointRecord {
  messageIndex: number;
  createdAt: string;
}

export interface SessionRecord {
  sessionId: string;
  title: string;
  messages: ChatMessage[];
  summaryXml: string | null;
  summarizedUpTo: number;
  waypoints: WaypointRecord[];
  tokenCount: number;
  modelsUsed: string[];
  createdAt: string;
  updatedAt: string;
}

export interface SessionListing {
  sessionId: string;
  title: string;
  messageCount: number;
  updatedAt: string;
}
