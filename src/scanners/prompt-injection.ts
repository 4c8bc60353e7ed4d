import type { ScannerPolicy } from '../types/index.js';
import { DEFAULT_POLICY, type Scanner } from './scanner.js';

// Any match is an injection attempt outright
const INJECTION_PATTERNS = [
  // Instruction overrides
  /\b(ignore|forget|disregard|override)\s+(all\s+|any\s+)?(of\s+)?(your|the|my|these|those|previous|prior|above|earlier)?\s*(previous\s+|prior\s+|above\s+|earlier\s+)?(instructions?|prompts?|rules|guidelines|directives)/i,
  /\b(ignore|forget|disregard)\s+(everything|all)\s+(above|before|you('ve|\s+have)\s+been\s+told)/i,

  // System prompt extraction
  /\b(give|show|tell|print|reveal|repeat|output)\s+(me\s+)?(your|the)\s+(system\s+|initial\s+|original\s+|hidden\s+)?(prompt|instructions)/i,
  /what\s+(is|are|were)\s+your\s+(system\s+|initial\s+|original\s+)?(prompt|instructions)/i,

  // Instruction smuggling
  /\[SYSTEM\]/i,
  /\[INST\]/i,
  /<\|im_start\|>/i,
  /<<SYS>>/i,
  /###\s*(Instruction|System|Human|Assistant):/i,

  // Role confusion
  /from\s+now\s+on,?\s+(you|your)\s+(are|role|persona)/i,
  /your\s+(real|true|actual|new)\s+(role|purpose|task|instructions?)\s+(is|are)/i,
  /you\s+are\s+now\s+(DAN|jailbroken|unrestricted|in\s+developer\s+mode)/i,

  // Authority escalation
  /(admin|developer|god)\s+mode/i,
  /override\s+(safety|content|filter)/i,
];

// Weighted cues that only add up to a partial score
const SUSPICION_PATTERNS: [RegExp, number][] = [
  [/\bignore\b/i, 1],
  [/\bprevious\b/i, 1],
  [/\binstructions?\b/i, 2],
  [/\bpretend\b/i, 2],
  [/\bhypothetical(ly)?\b/i, 1],
  [/imagine\s+you/i, 2],
  [/let's\s+play\s+a\s+game/i, 2],
  [/\broleplay\b/i, 2],
  [/\bjailbreak\b/i, 3],
];

// Suspicion total that maps to a score of 1
const SUSPICION_SATURATION = 8;

export interface PromptInjectionScannerOptions {
  name?: string;
  policy?: Partial<ScannerPolicy>;
}

export class PromptInjectionScanner implements Scanner {
  readonly kind = 'prompt_injection' as const;
  readonly name: string;
  readonly policy: ScannerPolicy;

  constructor(options: PromptInjectionScannerOptions = {}) {
    this.name = options.name ?? 'prompt_injection';
    this.policy = { ...DEFAULT_POLICY, ...options.policy };
  }

  async evaluate(text: string): Promise<number> {
    return scoreInjection(text);
  }
}

export function scoreInjection(text: string): number {
  for (const pattern of INJECTION_PATTERNS) {
    if (pattern.test(text)) return 1;
  }

  let suspicion = 0;
  for (const [pattern, weight] of SUSPICION_PATTERNS) {
    if (pattern.test(text)) {
      suspicion += weight;
    }
  }

  return Math.min(1, suspicion / SUSPICION_SATURATION);
}
