import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { AgentConfigFile, MergedConfig } from './config-schema.js';
import {
  DEFAULT_CONFIG,
  CONFIG_FILE_VERSION,
  agentConfigFileSchema,
  isLogLevel,
} from './config-schema.js';
import { isNotFound } from '../utils/errno.js';

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables (secrets, paths, overrides)
 * 2. Config file (data/config/agent.json)
 * 3. Hardcoded defaults
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private loadedConfig: AgentConfigFile | null = null;
  private warnings: string[] = [];

  constructor(configPath = 'data/config', env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  /**
   * Load and merge configuration from all sources.
   */
  async load(): Promise<MergedConfig> {
    this.warnings = [];
    this.loadedConfig = await this.loadConfigFile();

    const config = this.deepClone(DEFAULT_CONFIG);

    if (this.loadedConfig) {
      this.mergeConfigFile(config, this.loadedConfig);
    }

    this.mergeEnvironment(config);

    return config;
  }

  /**
   * Get the raw loaded config file (for debugging).
   */
  getLoadedConfigFile(): AgentConfigFile | null {
    return this.loadedConfig;
  }

  /**
   * Non-fatal problems found during the last load. The logger does not exist
   * yet while config loads, so the container logs these afterwards.
   */
  getWarnings(): readonly string[] {
    return this.warnings;
  }

  /**
   * Load and validate the config file. A missing file means "use defaults".
   */
  private async loadConfigFile(): Promise<AgentConfigFile | null> {
    const filePath = join(this.configPath, 'agent.json');

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to read config file ${filePath}: ${message}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Config file ${filePath} is not valid JSON: ${message}`);
    }

    const parsed = agentConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new Error(`Config file ${filePath} is invalid: ${issues}`);
    }

    if (parsed.data.version > CONFIG_FILE_VERSION) {
      this.warnings.push(
        `Config file version (${String(parsed.data.version)}) is newer than supported ` +
          `(${String(CONFIG_FILE_VERSION)})`
      );
    }

    return parsed.data;
  }

  /**
   * Merge config file sections over the defaults (shallow per section).
   */
  private mergeConfigFile(config: MergedConfig, file: AgentConfigFile): void {
    if (file.persona) {
      config.persona = { ...config.persona, ...file.persona };
      if (file.persona.traits) {
        config.persona.traits = { ...DEFAULT_CONFIG.persona.traits, ...file.persona.traits };
      }
    }
    if (file.traitModel) config.traitModel = { ...config.traitModel, ...file.traitModel };
    if (file.orchestrator) config.orchestrator = { ...config.orchestrator, ...file.orchestrator };
    if (file.safety) config.safety = { ...config.safety, ...file.safety };
    if (file.context) config.context = { ...config.context, ...file.context };
    if (file.ethics) config.ethics = { ...config.ethics, ...file.ethics };
    if (file.correction) config.correction = { ...config.correction, ...file.correction };
    if (file.schedule) config.schedule = { ...config.schedule, ...file.schedule };
    if (file.exploration) config.exploration = { ...config.exploration, ...file.exploration };
    if (file.initiation) config.initiation = { ...config.initiation, ...file.initiation };
    if (file.reflection) config.reflection = { ...config.reflection, ...file.reflection };
    if (file.validation) config.validation = { ...config.validation, ...file.validation };
    if (file.evaluation) config.evaluation = { ...config.evaluation, ...file.evaluation };
    if (file.improvement) config.improvement = { ...config.improvement, ...file.improvement };
    if (file.storage) config.storage = { ...config.storage, ...file.storage };

    if (file.monitoring) {
      config.monitoring = { ...config.monitoring, ...file.monitoring };
      if (file.monitoring.dropThresholds) {
        config.monitoring.dropThresholds = {
          ...DEFAULT_CONFIG.monitoring.dropThresholds,
          ...file.monitoring.dropThresholds,
        };
      }
    }

    if (file.llm) {
      if (file.llm.baseUrl) config.llm.baseUrl = file.llm.baseUrl;
      if (file.llm.model) config.llm.model = file.llm.model;
      if (file.llm.timeoutMs !== undefined) config.llm.timeoutMs = file.llm.timeoutMs;
      if (file.llm.maxRetries !== undefined) config.llm.maxRetries = file.llm.maxRetries;
    }

    if (file.logging) config.logging = { ...config.logging, ...file.logging };
  }

  /**
   * Override config with environment variables.
   */
  private mergeEnvironment(config: MergedConfig): void {
    // Secrets (always from env)
    const apiKey = this.env['LLM_API_KEY'];
    if (apiKey) {
      config.llm.apiKey = apiKey;
    }

    const baseUrl = this.env['LLM_BASE_URL'];
    if (baseUrl) {
      config.llm.baseUrl = baseUrl;
    }

    const model = this.env['LLM_MODEL'];
    if (model) {
      config.llm.model = model;
    }

    const name = this.env['AGENT_NAME'];
    if (name) {
      config.persona.name = name;
    }

    const admins = this.env['ADMIN_SENDERS'];
    if (admins) {
      config.orchestrator.adminSenders = admins
        .split(',')
        .map((s) => s.trim())
        .filter((s) => s.length > 0);
    }

    const logLevel = this.env['LOG_LEVEL'];
    if (logLevel) {
      if (isLogLevel(logLevel)) {
        config.logging.level = logLevel;
      } else {
        this.warnings.push(`Ignoring unknown LOG_LEVEL "${logLevel}"`);
      }
    }

    const dataPath = this.env['DATA_PATH'];
    if (dataPath) {
      config.paths.data = dataPath;
      config.paths.config = join(dataPath, 'config');
      config.paths.state = join(dataPath, 'state');
      config.paths.logs = join(dataPath, 'logs');
      config.logging.logDir = config.paths.logs;
    }
  }

  private deepClone<T>(obj: T): T {
    return structuredClone(obj);
  }
}

/**
 * Factory function for creating a config loader.
 */
export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

/**
 * Load configuration from default paths.
 */
export async function loadConfig(configPath?: string): Promise<MergedConfig> {
  return createConfigLoader(configPath).load();
}
