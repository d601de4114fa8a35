/**
 * Sampling parameters shared by the model-backed generators. Self-improvement
 * experiments adjust them while the agent runs.
 */

export interface GenerationParameters {
  temperature: number;
  maxTokens: number;
}

export type GenerationParameter = keyof GenerationParameters;

export const DEFAULT_GENERATION_PARAMETERS: GenerationParameters = {
  temperature: 0.7,
  maxTokens: 600,
};

/** Inclusive range each parameter is clamped to */
export const GENERATION_PARAMETER_BOUNDS: Record<GenerationParameter, [number, number]> = {
  temperature: [0.1, 1.5],
  maxTokens: [100, 2000],
};

export function isGenerationParameter(name: string): name is GenerationParameter {
  return name === 'temperature' || name === 'maxTokens';
}

export function clampParameter(name: GenerationParameter, value: number): number {
  const [min, max] = GENERATION_PARAMETER_BOUNDS[name];
  const clamped = Math.min(max, Math.max(min, value));
  return name === 'maxTokens' ? Math.round(clamped) : Math.round(clamped * 100) / 100;
}

export class GenerationSettings {
  private readonly values: GenerationParameters;

  constructor(initial: Partial<GenerationParameters> = {}) {
    this.values = { ...DEFAULT_GENERATION_PARAMETERS, ...initial };
  }

  get(name: GenerationParameter): number {
    return this.values[name];
  }

  /**
   * Set a parameter, clamped to its bounds.
   * @returns The previous value
   */
  set(name: GenerationParameter, value: number): number {
    const previous = this.values[name];
    this.values[name] = clampParameter(name, value);
    return previous;
  }

  snapshot(): GenerationParameters {
    return { ...this.values };
  }
}
