import type { InferenceClient } from '../inference/index.js';
import type { ScannerConfig } from '../config/index.js';
import type { Scanner } from './scanner.js';
import { PromptInjectionScanner } from './prompt-injection.js';
import { ModelInjectionScanner } from './model-injection.js';
import { RegexScanner } from './regex.js';
import { TokenLimitScanner } from './token-limit.js';

export function createScanner(config: ScannerConfig, inference: InferenceClient): Scanner {
  const policy = { threshold: config.threshold, block: config.block };

  switch (config.type) {
    case 'prompt_injection':
      return new PromptInjectionScanner({ name: config.name, policy });

    case 'prompt_injection_model':
      return new ModelInjectionScanner(inference, { name: config.name, backend: config.backend, policy });

    case 'regex':
      return new RegexScanner({
        name: config.name,
        patterns: config.patterns,
        isBlocked: config.is_blocked,
        matchType: config.match_type,
        redact: config.redact,
        policy
      });

    case 'token_limit':
      return new TokenLimitScanner({ name: config.name, limit: config.limit, policy });
  }
}

export function createScanners(configs: ScannerConfig[], inference: InferenceClient): Scanner[] {
  return configs.map(config => createScanner(config, inference));
}
