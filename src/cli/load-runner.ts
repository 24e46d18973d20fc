import * as path from 'path'
import type { Runner } from '../lambda/runtime/runner'

export type AnyRunner = Runner<unknown, unknown, unknown>

function hasFunction(value: object, key: string): boolean {
  return key in value && typeof Reflect.get(value, key) === 'function'
}

export function isRunner(value: unknown): value is AnyRunner {
  if (typeof value !== 'object' || value === null) {
    return false
  }
  if (!hasFunction(value, 'setup') || !hasFunction(value, 'run')) {
    return false
  }
  const schema: unknown = Reflect.get(value, 'eventSchema')
  return typeof schema === 'object' && schema !== null && hasFunction(schema, 'safeParse')
}

/**
 * Loads a module exporting a runner, either as its default export or as a
 * named `runner` export.
 */
export async function loadRunner(modulePath: string): Promise<AnyRunner> {
  const resolved = path.resolve(modulePath)
  const loaded: unknown = await import(resolved)

  if (typeof loaded === 'object' && loaded !== null) {
    for (const key of ['default', 'runner']) {
      const candidate: unknown = Reflect.get(loaded, key)
      if (isRunner(candidate)) {
        return candidate
      }
    }
  }

  throw new Error(
    `${resolved} does not export a runner (expected a default or "runner" export with eventSchema, setup and run)`,
  )
}
