import { Readable, Writable } from 'stream'
import type { ProcessLauncher } from '../src/kubectl-runner.js'

export interface FakeResult {
  stdout?: string
  exitCode?: number | null
  /** Makes the process fail to start */
  error?: Error
}

export interface LaunchCall {
  command: string
  args: string[]
  interactive: boolean
}

/**
 * Stand-in for kubectl. Each launch is answered by `respond`, which sees
 * the argument vector.
 */
export class FakeLauncher {
  readonly calls: LaunchCall[] = []

  constructor(
    private respond: (args: readonly string[]) => FakeResult = () => ({})
  ) {}

  readonly launch: ProcessLauncher = (command, args, options) => {
    this.calls.push({
      command,
      args: [...args],
      interactive: options.interactive
    })

    const result = this.respond(args)
    return {
      stdout: Readable.from(result.stdout ? [result.stdout] : []),
      exit: result.error
        ? Promise.reject(result.error)
        : Promise.resolve(
            result.exitCode === undefined ? 0 : result.exitCode
          )
    }
  }

  /** Argument vectors of every launch, in order */
  argv(): string[][] {
    return this.calls.map((call) => call.args)
  }
}

/**
 * A writable that keeps everything written to it
 */
export function collectingSink(): { sink: Writable; output: () => string } {
  const chunks: string[] = []
  const sink = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk))
      callback()
    }
  })
  return { sink, output: () => chunks.join('') }
}
