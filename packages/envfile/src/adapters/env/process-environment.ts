import type { Environment } from "../../ports/environment"

export type ProcessEnvironmentOptions = {
  env?: Record<string, string | undefined>
}

export class ProcessEnvironment implements Environment {
  private readonly env: Record<string, string | undefined>

  constructor(options: ProcessEnvironmentOptions = {}) {
    this.env = options.env ?? process.env
  }

  snapshot(): Record<string, string> {
    const out: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (value !== undefined) out[key] = value
    }

    return out
  }
}
