export { AsyncTenantContext } from "./adapters/context/async-tenant-context"
export { StaticTenantContext } from "./adapters/context/static-tenant-context"
export {
  type ConfigureStep,
  ConfigureOptionsPipeline,
} from "./adapters/pipeline/configure-options-pipeline"
export {
  DotenvSettingsSource,
  type DotenvSettingsSourceOptions,
} from "./adapters/settings/dotenv-settings-source"
export {
  EnvSettingsSource,
  type EnvSettingsSourceOptions,
} from "./adapters/settings/env-settings-source"
export {
  type BuildOptions,
  MultiTenantBuilder,
  type MultiTenantBuilderDeps,
} from "./core/builder/multi-tenant-builder"
export { MultiTenantOptions } from "./core/builder/multi-tenant-options"
export {
  MultiplexedOptionsCache,
  type MultiplexedOptionsCacheDeps,
} from "./core/cache/multiplexed-options-cache"
export {
  BaseConfigurationError,
  InvalidRegistrationError,
  InvalidTenantError,
  InvariantViolationError,
  MutationError,
  NoTenantContextError,
  OptionsValidationError,
  type ResolutionContext,
  SettingsError,
} from "./core/errors/errors"
export {
  type ErrorContext,
  isOptionsError,
  OptionsError,
  type OptionsErrorCode,
  type SerializedError,
  serializeError,
} from "./core/errors/options-error"
export { TenantMutatorRegistry } from "./core/registry/tenant-mutator-registry"
export { OptionsAccessor } from "./core/resolution/options-accessor"
export {
  OptionsResolver,
  type OptionsResolverConfig,
  type OptionsResolverDeps,
  type ResolveOptions,
} from "./core/resolution/options-resolver"
export {
  ServiceContainer,
  type ServiceFactory,
  type ServiceFactoryContext,
  ServiceScope,
  type ServiceType,
} from "./core/services/service-container"
export { createLoggerFromSettings } from "./core/settings/create-logger"
export {
  defaultSettings,
  type LoadSettingsOptions,
  loadSettings,
  type MultiTenantSettings,
} from "./core/settings/load-settings"
export type * from "./ports/options-cache"
export type { OptionsPipeline } from "./ports/options-pipeline"
export { DEFAULT_OPTIONS_NAME, type OptionsName, type OptionsType } from "./ports/options-type"
export type { ServiceLifetime } from "./ports/service-lifetime"
export type { SettingsSource } from "./ports/settings-source"
export type { TenantContextAccessor } from "./ports/tenant-context"
export type { TenantId, TenantInfo } from "./ports/tenant-info"
export {
  allNames,
  type MutatorEntry,
  type MutatorSource,
  type NameFilter,
  named,
  type TenantMutator,
} from "./ports/tenant-mutator"
export type { TenantStore } from "./ports/tenant-store"
export type { TenantStrategy } from "./ports/tenant-strategy"
