/**
 * A piece of externally sourced information the agent came across while exploring.
 */
export interface Discovery {
  id: string;
  topic: string;
  content: string;
  /** URL or feed name the discovery came from */
  source: string;
  /** 0-1 */
  importance: number;
  discoveredAt: Date;
}
