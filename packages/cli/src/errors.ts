import { ConfigurationError } from '@parley/llm';

/** No Gemini API key after merging the config file and the environment. */
export class ConfigurationMissingError extends ConfigurationError {
  readonly configPath: string;

  constructor(configPath: string) {
    super(`No Gemini API key configured (looked in ${configPath} and GEMINI_API_KEY).`);
    this.configPath = configPath;
  }
}
