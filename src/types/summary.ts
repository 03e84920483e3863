export type ChatRole = 'user' | 'assistant' | 'system';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface SummaryRequest {
  persona: string;
  userId: string;
  messages: ChatMessage[];
}

export interface SummaryResult {
  text: string;
}
