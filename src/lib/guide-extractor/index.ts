export { parseGuideChannels, type GuideParseResult } from './xmltv-parser';
export {
  extractGuides,
  isGzipped,
  type GuideExtraction,
  type GuideExtractorDeps,
  type GuideExtractorOptions,
} from './guide-extractor';
