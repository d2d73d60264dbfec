import type { Logger } from '../logger'
import type { HookHandler, HookResult } from '../types'

interface RegisteredHook<T> {
  name: string
  handler: HookHandler<T>
}

type HookTable<Events> = { [K in keyof Events]?: RegisteredHook<Events[K]>[] }

/**
 * Ordered registry of named callbacks per event.
 *
 * Registration never de-duplicates: callers that must register once guard
 * themselves.
 */
export class HookRegistry<Events extends object> {
  private hooks: HookTable<Events> = {}

  constructor(private log?: Logger) {}

  /**
   * Register a named handler for an event.
   * @returns A function that removes exactly this registration.
   */
  on<K extends keyof Events>(event: K, name: string, handler: HookHandler<Events[K]>): () => void {
    const registered: RegisteredHook<Events[K]> = { name, handler }
    const hooks = (this.hooks[event] ??= [])
    hooks.push(registered)

    return () => {
      const current = this.hooks[event]
      if (!current)
        return
      const index = current.indexOf(registered)
      if (index > -1)
        current.splice(index, 1)
    }
  }

  /**
   * Run every handler for the event in order, one at a time. A failing
   * handler does not stop the ones after it.
   */
  async emit<K extends keyof Events>(event: K, data: Events[K]): Promise<HookResult[]> {
    const hooks = [...(this.hooks[event] ?? [])]
    const results: HookResult[] = []

    for (const hook of hooks) {
      try {
        await hook.handler(data)
        results.push({ success: true, name: hook.name })
      }
      catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        this.log?.error(`Error in hook '${hook.name}' for '${String(event)}':`, message)
        results.push({ success: false, name: hook.name, error: message })
      }
    }

    return results
  }
}
