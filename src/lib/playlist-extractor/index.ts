export { extractAttribute, parsePlaylist } from './m3u-parser';
export {
  extractPlaylists,
  type PlaylistExtraction,
  type PlaylistExtractorDeps,
  type PlaylistExtractorOptions,
} from './playlist-extractor';
