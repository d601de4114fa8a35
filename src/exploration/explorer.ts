import type { Logger } from '../types/logger.js';
import type { IDiscoverySource } from '../ports/discovery-source.js';
import type { DiscoveryBuffer } from './discovery-buffer.js';

export interface ExplorerConfig {
  defaultTopics: string[];
  resultsPerSearch: number;
}

export interface ExplorationResult {
  topic: string | null;
  found: number;
  added: number;
}

/**
 * Exploration: picks a topic from the persona's interests and the default
 * topics, asks the discovery source about it, and buffers what comes back.
 */
export class Explorer {
  private readonly source: IDiscoverySource;
  private readonly buffer: DiscoveryBuffer;
  private readonly interests: () => readonly string[];
  private readonly config: ExplorerConfig;
  private readonly logger: Logger;
  private readonly random: () => number;

  constructor(
    source: IDiscoverySource,
    buffer: DiscoveryBuffer,
    interests: () => readonly string[],
    config: ExplorerConfig,
    logger: Logger,
    random: () => number = Math.random
  ) {
    this.source = source;
    this.buffer = buffer;
    this.interests = interests;
    this.config = config;
    this.logger = logger.child({ component: 'explorer' });
    this.random = random;
  }

  /**
   * Candidate topics, interests first, without case-insensitive duplicates.
   */
  topics(): string[] {
    const seen = new Set<string>();
    const topics: string[] = [];
    for (const topic of [...this.interests(), ...this.config.defaultTopics]) {
      const key = topic.trim().toLowerCase();
      if (key.length === 0 || seen.has(key)) continue;
      seen.add(key);
      topics.push(topic.trim());
    }
    return topics;
  }

  pickTopic(): string | null {
    const topics = this.topics();
    if (topics.length === 0) return null;
    const index = Math.min(topics.length - 1, Math.floor(this.random() * topics.length));
    return topics[index] ?? null;
  }

  async explore(): Promise<ExplorationResult> {
    const topic = this.pickTopic();
    if (topic === null) {
      this.logger.debug('No topics to explore');
      return { topic: null, found: 0, added: 0 };
    }

    const discoveries = await this.source.search(topic, this.config.resultsPerSearch);
    const found = discoveries.slice(0, this.config.resultsPerSearch);
    const added = this.buffer.add(found);

    this.logger.info(
      { topic, source: this.source.name, found: found.length, added },
      'Exploration complete'
    );
    return { topic, found: found.length, added };
  }
}
