/**
 * JSON File Store
 *
 * One JSON document per artifact in a data directory, written with
 * two-space indentation. Writes go to a temporary file first and are
 * renamed into place.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ChannelRecord, DeadLinks, EndpointDocument, GuideGroups } from '@/types';
import { LoadError, SaveError, errorMessage } from '@/lib/errors';
import {
  decodeChannels,
  decodeEndpointDocument,
  decodeGuides,
  encodeChannels,
  encodeDeadLinks,
  encodeEndpointDocument,
  encodeGuides,
} from './records';
import { ARTIFACTS, type Artifact, type RecordStore } from './record-store';

export class JsonFileStore implements RecordStore {
  constructor(private readonly dataDir: string) {}

  /**
   * Path of an artifact's JSON file
   */
  pathOf(artifact: Artifact): string {
    return join(this.dataDir, `${artifact}.json`);
  }

  private async read<T>(artifact: Artifact, decode: (value: unknown) => T): Promise<T> {
    const path = this.pathOf(artifact);

    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      throw new LoadError(artifact, `cannot read ${path}: ${errorMessage(error)}`, { cause: error });
    }

    try {
      return decode(JSON.parse(text));
    } catch (error) {
      throw new LoadError(artifact, `invalid data in ${path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async write(artifact: Artifact, value: unknown): Promise<void> {
    const path = this.pathOf(artifact);
    const tempPath = `${path}.tmp`;

    try {
      await mkdir(this.dataDir, { recursive: true });
      await writeFile(tempPath, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
      await rename(tempPath, path);
    } catch (error) {
      throw new SaveError(artifact, `cannot write ${path}: ${errorMessage(error)}`, { cause: error });
    }
  }

  loadEndpoints(): Promise<EndpointDocument> {
    return this.read(ARTIFACTS.endpoints, decodeEndpointDocument);
  }

  saveEndpoints(document: EndpointDocument): Promise<void> {
    return this.write(ARTIFACTS.endpoints, encodeEndpointDocument(document));
  }

  saveDeadLinks(deadLinks: DeadLinks): Promise<void> {
    return this.write(ARTIFACTS.deadLinks, encodeDeadLinks(deadLinks));
  }

  loadChannels(): Promise<ChannelRecord[]> {
    return this.read(ARTIFACTS.channels, decodeChannels);
  }

  saveChannels(channels: readonly ChannelRecord[]): Promise<void> {
    return this.write(ARTIFACTS.channels, encodeChannels(channels));
  }

  loadGuides(): Promise<GuideGroups> {
    return this.read(ARTIFACTS.guides, decodeGuides);
  }

  saveGuides(groups: GuideGroups): Promise<void> {
    return this.write(ARTIFACTS.guides, encodeGuides(groups));
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}
