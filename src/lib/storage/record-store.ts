/**
 * Record Store
 *
 * Persistence boundary for pipeline artifacts. Loads throw LoadError when
 * the stored data is missing or malformed; saves throw SaveError.
 */

import type { ChannelRecord, DeadLinks, EndpointDocument, GuideGroups } from '@/types';

export interface RecordStore {
  loadEndpoints(): Promise<EndpointDocument>;
  saveEndpoints(document: EndpointDocument): Promise<void>;
  saveDeadLinks(deadLinks: DeadLinks): Promise<void>;
  loadChannels(): Promise<ChannelRecord[]>;
  saveChannels(channels: readonly ChannelRecord[]): Promise<void>;
  loadGuides(): Promise<GuideGroups>;
  saveGuides(groups: GuideGroups): Promise<void>;
  /** Release connections; a no-op for stores without any */
  close(): Promise<void>;
}

/**
 * Artifact names, also used as file names and key suffixes
 */
export const ARTIFACTS = {
  endpoints: 'playlist_epg_urls',
  deadLinks: 'dead_links',
  channels: 'channels_metadata',
  guides: 'epg_metadata',
} as const;

export type Artifact = (typeof ARTIFACTS)[keyof typeof ARTIFACTS];
