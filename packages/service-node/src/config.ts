import { Config, Context, Effect, Layer } from "effect"

export interface DownstreamDefinition {
  readonly name: string
  // environment variable holding the base URL
  readonly urlEnv: string
  readonly defaultUrl: string
}

/**
 * What distinguishes one node of the chain from another.
 */
export interface NodeDefinition {
  readonly serviceName: string
  readonly defaultPort: number
  // absent for the last node of the chain
  readonly downstream?: DownstreamDefinition
}

export interface DownstreamTarget {
  readonly name: string
  readonly url: string
}

export interface ServiceNodeSettings {
  readonly serviceName: string
  readonly port: number
  readonly downstream: DownstreamTarget | undefined
  readonly downstreamTimeoutMs: number
  readonly workDelayMs: number
  readonly drainTimeoutMs: number
}

export class ServiceNodeConfig extends Context.Tag("ServiceNodeConfig")<
  ServiceNodeConfig,
  ServiceNodeSettings
>() {}

const loadDownstream = (definition: DownstreamDefinition) =>
  Config.string(definition.urlEnv).pipe(
    Config.withDefault(definition.defaultUrl),
    Config.map((value) => {
      const url = value.trim() === "" ? definition.defaultUrl : value.trim()
      return { name: definition.name, url: url.replace(/\/+$/, "") }
    })
  )

export const loadServiceNodeConfig = (definition: NodeDefinition) =>
  Effect.gen(function* () {
    return {
      serviceName: definition.serviceName,
      port: yield* Config.integer("PORT").pipe(Config.withDefault(definition.defaultPort)),
      downstream: definition.downstream ? yield* loadDownstream(definition.downstream) : undefined,
      downstreamTimeoutMs: yield* Config.number("DOWNSTREAM_TIMEOUT_MS").pipe(Config.withDefault(5000)),
      workDelayMs: yield* Config.number("WORK_DELAY_MS").pipe(Config.withDefault(100)),
      drainTimeoutMs: yield* Config.number("DRAIN_TIMEOUT_MS").pipe(Config.withDefault(10_000))
    } satisfies ServiceNodeSettings
  })

export const ServiceNodeConfigLive = (definition: NodeDefinition) =>
  Layer.effect(ServiceNodeConfig, loadServiceNodeConfig(definition))
