export interface VideoRef {
  id: string;
  title: string;
  publishedAt: string;
  url: string;
}

export type VideoTarget =
  | { kind: 'latest'; channelId: string; titlePattern: string }
  | { kind: 'video'; videoId: string };
