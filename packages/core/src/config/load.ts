import { Config, Effect } from "effect"
import { ConfigurationError } from "../domain/errors.js"

/** Reads `config`, reporting a missing or invalid value as a ConfigurationError. */
export const loadConfig = <A>(config: Config.Config<A>): Effect.Effect<A, ConfigurationError> =>
  Effect.mapError(config, (cause) => new ConfigurationError({ cause, message: `Invalid configuration: ${String(cause)}` }))
