export interface NotificationChunk {
  index: number;
  body: string;
}

export interface DiscordEmbed {
  title?: string;
  description: string;
  color?: number;
  timestamp?: string;
  footer?: { text: string };
}

export interface DiscordWebhookPayload {
  embeds: DiscordEmbed[];
}

export interface PublishReport {
  delivered: number;
  total: number;
}
