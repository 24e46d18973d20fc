export * from './runtime/errors'
export * from './runtime/logger'
export * from './runtime/config'
export * from './runtime/deadline'
export * from './runtime/runner'
export * from './runtime/harness'
export * from './runtime/exec'
export * from './runtime/test-runtime'
export * from './rotate/event'
export * from './rotate/container'
export * from './rotate/gateway'
export * from './rotate/throttle'
export * from './rotate/secrets-manager-gateway'
export * from './rotate/rotate-runner'
