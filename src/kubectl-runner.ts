import { spawn } from 'child_process'
import { once } from 'events'
import { KUBECTL } from './constants.js'
import { SubprocessFailedError } from './errors.js'

/**
 * Flags understood by the wrapped kubectl commands. Each flag is only added
 * to the argument vector when it differs from its default.
 */
export interface KubectlOptions {
  filenames?: readonly string[]
  /** Patch document for `kubectl patch` */
  patch?: string
  patchType?: string
  dryRun?: boolean
  selector?: string
  namespace?: string
  all?: boolean
  ignoreNotFound?: readonly string[]
  output?: string
  /** Positional arguments appended after all flags */
  args?: readonly string[]
}

/**
 * A started process whose stdout is piped back to us
 */
export interface LaunchedProcess {
  stdout: NodeJS.ReadableStream
  /** Resolves with the exit code, rejects when the process cannot start */
  exit: Promise<number | null>
}

/**
 * Starts a process. With `interactive` set the child shares our stdin and
 * stderr; otherwise both are detached.
 */
export type ProcessLauncher = (
  command: string,
  args: readonly string[],
  options: { interactive: boolean }
) => LaunchedProcess

export interface KubectlRunnerOptions {
  binary?: string
  launch?: ProcessLauncher
  /** Stream that receives a live copy of kubectl's stdout */
  sink?: NodeJS.WritableStream
}

/**
 * Builds the kubectl argument vector: command, flags, then positional
 * arguments.
 */
export function buildKubectlArgs(
  command: string,
  options: KubectlOptions = {}
): string[] {
  const args = [command]

  for (const filename of options.filenames ?? []) {
    args.push('-f', filename)
  }
  if (options.patch !== undefined) {
    args.push('-p', options.patch)
  }
  if (options.patchType) {
    args.push('--type', options.patchType)
  }
  if (options.dryRun) {
    args.push('--dry-run=client')
  }
  if (options.selector) {
    args.push('-l', options.selector)
  }
  if (options.namespace) {
    args.push('-n', options.namespace)
  }
  if (options.all) {
    args.push('--all')
  }
  for (const value of options.ignoreNotFound ?? []) {
    args.push(`--ignore-not-found=${value}`)
  }
  if (options.output) {
    args.push('-o', options.output)
  }

  args.push(...(options.args ?? []))
  return args
}

export const spawnProcess: ProcessLauncher = (command, args, options) => {
  const passthrough = options.interactive ? 'inherit' : 'ignore'
  const child = spawn(command, args, {
    stdio: [passthrough, 'pipe', passthrough]
  })

  const exit = new Promise<number | null>((resolve, reject) => {
    child.once('error', reject)
    child.once('close', (code) => resolve(code))
  })

  const { stdout } = child
  if (!stdout) {
    throw new Error(`${command} was started without a stdout pipe`)
  }
  return { stdout, exit }
}

/**
 * Runs kubectl as a child process and captures what it prints.
 */
export class KubectlRunner {
  private binary: string
  private launch: ProcessLauncher
  private sink: NodeJS.WritableStream

  constructor(options: KubectlRunnerOptions = {}) {
    this.binary = options.binary ?? KUBECTL.DEFAULT_BINARY
    this.launch = options.launch ?? spawnProcess
    this.sink = options.sink ?? process.stdout
  }

  /**
   * Runs kubectl in the foreground. Stdout is shown to the user as it
   * arrives and also returned once the process exits.
   *
   * @throws SubprocessFailedError when kubectl exits non-zero or cannot start
   */
  async run(args: readonly string[]): Promise<string> {
    return this.execute(args, true)
  }

  /**
   * Runs kubectl silently and returns its stdout, e.g. for `get -o yaml`.
   *
   * @throws SubprocessFailedError when kubectl exits non-zero or cannot start
   */
  async capture(args: readonly string[]): Promise<string> {
    return this.execute(args, false)
  }

  private async execute(
    args: readonly string[],
    interactive: boolean
  ): Promise<string> {
    const command = args[0] ?? ''
    const chunks: Buffer[] = []

    let exitCode: number | null
    try {
      const child = this.launch(this.binary, args, { interactive })
      const [, code] = await Promise.all([
        this.drain(child.stdout, chunks, interactive),
        child.exit
      ])
      exitCode = code
    } catch (error) {
      throw new SubprocessFailedError(command, null, error)
    }

    if (exitCode !== 0) {
      throw new SubprocessFailedError(command, exitCode)
    }
    return Buffer.concat(chunks).toString('utf8')
  }

  private async drain(
    stream: NodeJS.ReadableStream,
    chunks: Buffer[],
    echo: boolean
  ): Promise<void> {
    for await (const chunk of stream) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)
      chunks.push(buffer)
      if (echo && !this.sink.write(buffer)) {
        await once(this.sink, 'drain')
      }
    }
  }
}
