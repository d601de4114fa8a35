/**
 * Discovery Source Port
 *
 * Where exploration looks for new information.
 */

import type { Discovery } from '../types/discovery.js';

export interface IDiscoverySource {
  readonly name: string;

  /**
   * Up to `limit` discoveries about a topic. An empty list is a valid answer.
   */
  search(topic: string, limit: number): Promise<Discovery[]>;
}
