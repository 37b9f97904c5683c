import { PostRequest, PostRequestMap, SupportedPlatform } from './types';

export const MESSAGE_LIMITS: Partial<Record<SupportedPlatform, number>> = {
  x: 280,
  linkedin: 1300,
  facebook: 500,
  instagram: 2200,
};

const MAX_MEDIUM_TAGS = 5;
const MAX_TITLE_LENGTH = 100;

export interface FanoutContent {
  message: string;
  title?: string;
  tags?: string[];
  mediaPath?: string; // local file for browser publishers
  mediaUrl?: string; // public URL for Graph API publishers
}

export const truncateMessage = (text: string, limit: number): string =>
  text.length <= limit ? text : `${text.slice(0, limit - 1).trimEnd()}…`;

const firstLine = (text: string): string => text.split('\n').map((line) => line.trim()).find(Boolean) ?? '';

/** Tailors one piece of content to each platform's length limit and media channel. */
export const fanOutContent = (content: FanoutContent, platforms: SupportedPlatform[]): PostRequestMap => {
  const requests: PostRequestMap = {};
  const limited = (platform: SupportedPlatform): string => {
    const limit = MESSAGE_LIMITS[platform];
    return limit ? truncateMessage(content.message, limit) : content.message;
  };

  for (const platform of platforms) {
    let request: Omit<PostRequest, 'platform'> | undefined;
    switch (platform) {
      case 'x':
      case 'linkedin':
        request = { payload: { message: limited(platform) }, mediaRef: content.mediaPath };
        break;
      case 'facebook':
        request = { payload: { message: limited(platform) }, mediaRef: content.mediaUrl };
        break;
      case 'instagram':
        request = { payload: { caption: limited(platform) }, mediaRef: content.mediaUrl };
        break;
      case 'medium':
        request = {
          payload: {
            title: content.title?.trim() || truncateMessage(firstLine(content.message), MAX_TITLE_LENGTH),
            message: content.message,
            tags: (content.tags ?? []).map((tag) => tag.trim()).filter(Boolean).slice(0, MAX_MEDIUM_TAGS).join(','),
          },
        };
        break;
      case 'google_maps':
        break; // lead source only
    }
    if (request) requests[platform] = request;
  }
  return requests;
};
