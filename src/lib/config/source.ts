/**
 * Loads raw configuration values. Sources neither validate nor coerce;
 * when several are given, later ones win.
 */
export interface ConfigSource {
  /** Used in error messages, e.g. `env` or `dotenv:.env.test`. */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
