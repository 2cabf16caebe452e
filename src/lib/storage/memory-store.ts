/**
 * In-memory Record Store
 *
 * Keeps artifacts in process memory. An artifact that was never saved
 * loads as a LoadError, the same as a missing file or key.
 */

import type { ChannelRecord, DeadLinks, EndpointDocument, GuideGroups } from '@/types';
import { LoadError } from '@/lib/errors';
import { ARTIFACTS, type RecordStore } from './record-store';

export interface MemoryStoreContents {
  endpoints?: EndpointDocument;
  deadLinks?: DeadLinks;
  channels?: ChannelRecord[];
  guides?: GuideGroups;
}

export class MemoryStore implements RecordStore {
  constructor(public contents: MemoryStoreContents = {}) {}

  async loadEndpoints(): Promise<EndpointDocument> {
    if (!this.contents.endpoints) throw new LoadError(ARTIFACTS.endpoints, 'not stored');
    return this.contents.endpoints;
  }

  async saveEndpoints(document: EndpointDocument): Promise<void> {
    this.contents.endpoints = document;
  }

  async saveDeadLinks(deadLinks: DeadLinks): Promise<void> {
    this.contents.deadLinks = deadLinks;
  }

  async loadChannels(): Promise<ChannelRecord[]> {
    if (!this.contents.channels) throw new LoadError(ARTIFACTS.channels, 'not stored');
    return [...this.contents.channels];
  }

  async saveChannels(channels: readonly ChannelRecord[]): Promise<void> {
    this.contents.channels = [...channels];
  }

  async loadGuides(): Promise<GuideGroups> {
    if (!this.contents.guides) throw new LoadError(ARTIFACTS.guides, 'not stored');
    return this.contents.guides;
  }

  async saveGuides(groups: GuideGroups): Promise<void> {
    this.contents.guides = groups;
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}
