/** Built-in engines: tag -> argv prefix. The mission is appended as the final argument. */
export const BUILTIN_ENGINES: Readonly<Record<string, readonly string[]>> = {
  claude: ['claude'],
  opencode: ['opencode'],
  gemini: ['gemini', '--approval-mode', 'yolo'],
};

export interface ResolvedEngine {
  /** The engine actually used. */
  engine: string;
  /** The tag that was asked for, when it differs from `engine`. */
  requested?: string;
  argv: string[];
}

/** Used when the configured default names no registered engine. */
export const FALLBACK_ENGINE = 'gemini';

/**
 * Maps engine tags to launch vectors. Unknown tags fall back to the
 * default engine rather than failing.
 */
export class EngineRegistry {
  private readonly engines: Map<string, readonly string[]>;
  readonly defaultEngine: string;
  /** The configured default, when it was not registered and FALLBACK_ENGINE took its place. */
  readonly unknownDefault?: string;

  constructor(overrides: Record<string, readonly string[]> = {}, defaultEngine = FALLBACK_ENGINE) {
    this.engines = new Map(Object.entries({ ...BUILTIN_ENGINES, ...overrides }));
    if (this.engines.has(defaultEngine)) {
      this.defaultEngine = defaultEngine;
    } else {
      this.defaultEngine = FALLBACK_ENGINE;
      this.unknownDefault = defaultEngine;
    }
  }

  list(): string[] {
    return [...this.engines.keys()];
  }

  has(tag: string): boolean {
    return this.engines.has(tag);
  }

  resolve(tag: string | undefined, mission: string): ResolvedEngine {
    const wanted = tag ?? this.defaultEngine;
    const prefix = this.engines.get(wanted);
    if (prefix) {
      return { engine: wanted, argv: [...prefix, mission] };
    }
    const fallback = this.engines.get(this.defaultEngine) ?? [];
    return { engine: this.defaultEngine, requested: wanted, argv: [...fallback, mission] };
  }
}
