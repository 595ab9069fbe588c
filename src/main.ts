import * as os from 'os'
import * as readline from 'node:readline/promises'
import { parseArgs } from 'node:util'
import * as core from '@actions/core'
import {
  runApply,
  runDelete,
  runDiff,
  runPatch,
  runTimeline,
  type CommandContext
} from './commands.js'
import { KUBECTL, KUBERNETES, RECORDS } from './constants.js'
import {
  ClientUnavailableError,
  InvalidArgumentError,
  describeError
} from './errors.js'
import { KubectlRunner } from './kubectl-runner.js'
import { connectToCluster } from './kubernetes-record-store.js'
import { ManifestComparator } from './manifest-comparator.js'
import { ManifestLoader } from './manifest-loader.js'
import { RecordCoordinator } from './record-coordinator.js'
import { ClusterStateResolver, KubectlStateReader } from './state-resolver.js'
import { TimelineView } from './timeline-view.js'

export const USAGE = `Usage: kubectl chronicle <command> [flags]

Commands:
  apply     -f <file>... [--dry-run] [-n <namespace>] [args]
  delete    [-f <file>...] [-l <selector>] [-n <namespace>] [--all]
            [--ignore-not-found=<value>] [args]
  patch     <resource> <patch> [-p|--type strategic|merge|json] [-n <namespace>]
  diff      [<history-id>] [-n <namespace>]
  timeline  [-n <namespace>]`

export type ContextFactory = () => CommandContext

/**
 * Parses the command line and runs one command. Failures are reported
 * through `core.setFailed`, which sets the exit code.
 *
 * @param argv - Arguments after the program name
 * @param createCtx - Builds the collaborators the command runs with
 */
export async function run(
  argv: readonly string[],
  createCtx: ContextFactory = createContext
): Promise<void> {
  try {
    const [command, ...rest] = argv

    switch (command) {
      case 'apply': {
        const { values, positionals } = parseOrThrow(() =>
          parseArgs({
            args: rest,
            options: {
              namespace: { type: 'string', short: 'n' },
              filename: { type: 'string', short: 'f', multiple: true },
              'dry-run': { type: 'boolean' }
            },
            allowPositionals: true
          })
        )
        await runApply(createCtx(), {
          filenames: values.filename ?? [],
          dryRun: values['dry-run'] ?? false,
          namespace: values.namespace ?? '',
          args: positionals
        })
        break
      }
      case 'delete': {
        const { values, positionals } = parseOrThrow(() =>
          parseArgs({
            args: rest,
            options: {
              namespace: { type: 'string', short: 'n' },
              filename: { type: 'string', short: 'f', multiple: true },
              selector: { type: 'string', short: 'l' },
              all: { type: 'boolean' },
              'ignore-not-found': { type: 'string', multiple: true }
            },
            allowPositionals: true
          })
        )
        await runDelete(createCtx(), {
          filenames: values.filename ?? [],
          selector: values.selector ?? '',
          namespace: values.namespace ?? '',
          all: values.all ?? false,
          ignoreNotFound: values['ignore-not-found'] ?? [],
          args: positionals
        })
        break
      }
      case 'patch': {
        const { values, positionals } = parseOrThrow(() =>
          parseArgs({
            args: rest,
            options: {
              namespace: { type: 'string', short: 'n' },
              type: { type: 'string', short: 'p' }
            },
            allowPositionals: true
          })
        )
        const [resource, patch] = positionals
        if (!resource || !patch) {
          throw new InvalidArgumentError(
            'patch requires a resource and a patch document'
          )
        }
        await runPatch(createCtx(), {
          resource,
          patch,
          type: values.type ?? KUBECTL.DEFAULT_PATCH_TYPE,
          namespace: values.namespace ?? ''
        })
        break
      }
      case 'diff': {
        const { values, positionals } = parseNamespaceOnly(rest)
        const [historyId] = positionals
        if (historyId) {
          await runDiff(createCtx(), historyId, values.namespace ?? '')
        } else {
          await runTimeline(createCtx(), values.namespace ?? '')
        }
        break
      }
      case 'timeline': {
        const { values } = parseNamespaceOnly(rest)
        await runTimeline(createCtx(), values.namespace ?? '')
        break
      }
      default:
        core.info(USAGE)
        if (command !== undefined && command !== 'help' && command !== '--help') {
          throw new InvalidArgumentError(`unknown command "${command}"`)
        }
    }
  } catch (error) {
    core.setFailed(describeError(error))
  }
}

/**
 * Wires the real collaborators: kubectl from `$KUBECTL` or the PATH, the
 * cluster from the default kubeconfig, and the OS user as applier.
 */
export function createContext(): CommandContext {
  const runner = new KubectlRunner({
    binary: process.env[KUBECTL.BINARY_ENV] || KUBECTL.DEFAULT_BINARY
  })

  const ctx: CommandContext = {
    runner,
    loader: new ManifestLoader(),
    resolver: new ClusterStateResolver(new KubectlStateReader(runner)),
    comparator: new ManifestComparator(),
    timeline: new TimelineView(),
    currentNamespace: KUBERNETES.DEFAULT_NAMESPACE,
    prompt: process.stdin.isTTY ? askOnTerminal : undefined,
    color: process.stdout.isTTY
  }

  try {
    const connection = connectToCluster()
    ctx.recorder = new RecordCoordinator({
      store: connection.store,
      appliedBy: currentUser()
    })
    ctx.currentNamespace = connection.namespace
  } catch (error) {
    if (!(error instanceof ClientUnavailableError)) {
      throw error
    }
    ctx.clientError = error
  }

  return ctx
}

function parseNamespaceOnly(args: string[]) {
  return parseOrThrow(() =>
    parseArgs({
      args,
      options: { namespace: { type: 'string', short: 'n' } },
      allowPositionals: true
    })
  )
}

/**
 * Rethrows a command line parse failure as an InvalidArgumentError.
 */
function parseOrThrow<T>(parser: () => T): T {
  try {
    return parser()
  } catch (error) {
    throw new InvalidArgumentError(describeError(error))
  }
}

function currentUser(): string {
  try {
    return os.userInfo().username || RECORDS.UNKNOWN_USER
  } catch (error) {
    core.debug(`Could not read the OS user: ${describeError(error)}`)
    return RECORDS.UNKNOWN_USER
  }
}

async function askOnTerminal(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  })
  try {
    return await rl.question(question)
  } finally {
    rl.close()
  }
}
