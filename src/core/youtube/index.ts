export {
  YouTubeClient,
  decodeHtmlEntities,
  videoUrl,
  type VideoSearchSource,
  type ChannelSearchOptions,
} from './client.js';
export { VideoLocator, titleMatches, type VideoLocatorOptions } from './locator.js';
