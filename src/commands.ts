import * as core from '@actions/core'
import { KUBECTL, RECORDS } from './constants.js'
import {
  ClientUnavailableError,
  InvalidArgumentError,
  describeError
} from './errors.js'
import { generateRecordName } from './id.js'
import { buildKubectlArgs, type KubectlRunner } from './kubectl-runner.js'
import type { ManifestComparator } from './manifest-comparator.js'
import type { ManifestLoader } from './manifest-loader.js'
import { analyzeOutput } from './output-analyzer.js'
import type { RecordCoordinator } from './record-coordinator.js'
import type { ClusterStateResolver } from './state-resolver.js'
import type { Prompt, TimelineView } from './timeline-view.js'
import type {
  HistoryRecord,
  ManifestDiff,
  OutputAnalysis,
  ResourceChange
} from './types.js'

/**
 * Collaborators shared by every command. The applier identity and cluster
 * connection are already bound into `recorder`.
 */
export interface CommandContext {
  runner: KubectlRunner
  loader: ManifestLoader
  resolver: ClusterStateResolver
  comparator: ManifestComparator
  timeline: TimelineView
  /** Missing when no cluster client could be built */
  recorder?: RecordCoordinator
  /** Why `recorder` is missing */
  clientError?: ClientUnavailableError
  /** Namespace of the current kubeconfig context */
  currentNamespace: string
  /** Reads the timeline selection; absent when stdin is not a terminal */
  prompt?: Prompt
  /** Colour diff output */
  color?: boolean
}

export interface ApplyOptions {
  filenames: string[]
  dryRun: boolean
  namespace: string
  args: string[]
}

export interface DeleteOptions {
  filenames: string[]
  selector: string
  namespace: string
  all: boolean
  ignoreNotFound: string[]
  args: string[]
}

export interface PatchOptions {
  resource: string
  patch: string
  type: string
  namespace: string
}

/**
 * What a recorded command did
 */
export interface CommandOutcome {
  analysis: OutputAnalysis
  snapshotName?: string
  historyName?: string
}

/**
 * `apply`: snapshot the manifest, run `kubectl apply`, then either record a
 * history of the resulting live state or discard the snapshot.
 */
export async function runApply(
  ctx: CommandContext,
  options: ApplyOptions
): Promise<CommandOutcome> {
  progress('Starting apply operation...')

  const manifest =
    options.filenames.length > 0 ? await ctx.loader.load(options.filenames) : ''
  const namespace = options.namespace || ctx.currentNamespace
  const recorder = recorderFor(ctx)

  let snapshotName: string | undefined
  if (recorder && !options.dryRun && manifest !== '') {
    try {
      snapshotName = await recorder.createSnapshot(manifest, namespace)
      progress(`Created snapshot: ${snapshotName}`)
    } catch (error) {
      core.warning(`Could not create snapshot: ${describeError(error)}`)
    }
  }

  const analysis = await execute(
    ctx,
    'Apply',
    buildKubectlArgs('apply', {
      filenames: options.filenames,
      dryRun: options.dryRun,
      namespace: options.namespace,
      args: options.args
    })
  )

  if (!analysis.hasChanges) {
    progress('No changes detected, skipping history recording')
    if (recorder && snapshotName) {
      await recorder.cleanupSnapshot(snapshotName, namespace)
    }
    return { analysis, snapshotName }
  }

  let historyName: string | undefined
  if (recorder && snapshotName && !options.dryRun) {
    const actualState = await resolveActualState(ctx, manifest, namespace)
    historyName = await recordHistory(
      recorder,
      actualState,
      snapshotName,
      namespace,
      analysis.changes
    )
  }
  return { analysis, snapshotName, historyName }
}

/**
 * `delete`: capture the state of the targeted resources, run
 * `kubectl delete`, and record that state when something was deleted.
 */
export async function runDelete(
  ctx: CommandContext,
  options: DeleteOptions
): Promise<CommandOutcome> {
  progress('Starting delete operation...')

  const namespace = options.namespace || ctx.currentNamespace
  const recorder = recorderFor(ctx)
  const beforeState = recorder ? await captureBeforeDelete(ctx, options) : ''

  const analysis = await execute(
    ctx,
    'Delete',
    buildKubectlArgs('delete', {
      filenames: options.filenames,
      selector: options.selector,
      namespace: options.namespace,
      all: options.all,
      ignoreNotFound: options.ignoreNotFound,
      args: options.args
    })
  )

  if (!analysis.hasChanges) {
    progress('No changes detected, skipping history recording')
    return { analysis }
  }

  let historyName: string | undefined
  if (recorder && beforeState !== '') {
    historyName = await recordHistory(
      recorder,
      beforeState,
      generateRecordName(RECORDS.DELETE_REF_PREFIX),
      namespace,
      analysis.changes
    )
  }
  return { analysis, historyName }
}

/**
 * `patch`: capture the resource, run `kubectl patch`, and record its
 * patched state when the patch had an effect.
 */
export async function runPatch(
  ctx: CommandContext,
  options: PatchOptions
): Promise<CommandOutcome> {
  const patchTypes: readonly string[] = KUBECTL.PATCH_TYPES
  if (!patchTypes.includes(options.type)) {
    throw new InvalidArgumentError(
      `unknown patch type "${options.type}", expected one of ${patchTypes.join(', ')}`
    )
  }

  progress('Starting patch operation...')

  const namespace = options.namespace || ctx.currentNamespace
  const recorder = recorderFor(ctx)
  const beforeState = recorder
    ? await captureResource(ctx, options.resource, options.namespace, '')
    : ''

  const analysis = await execute(
    ctx,
    'Patch',
    buildKubectlArgs('patch', {
      patch: options.patch,
      patchType: options.type,
      namespace: options.namespace,
      args: [options.resource]
    })
  )

  if (!analysis.hasChanges) {
    progress('No changes detected, skipping history recording')
    return { analysis }
  }

  let historyName: string | undefined
  if (recorder && beforeState !== '') {
    const afterState = await captureResource(
      ctx,
      options.resource,
      options.namespace,
      beforeState
    )
    historyName = await recordHistory(
      recorder,
      afterState,
      generateRecordName(RECORDS.PATCH_REF_PREFIX),
      namespace,
      analysis.changes
    )
  }
  return { analysis, historyName }
}

/**
 * `diff <history-id>`: show what a recorded change did, comparing the
 * snapshot taken before it with the state recorded after it.
 *
 * @throws LookupNotFoundError when the history or its snapshot is missing
 * @throws MalformedDocumentError when either manifest does not parse
 */
export async function runDiff(
  ctx: CommandContext,
  historyId: string,
  namespace: string
): Promise<ManifestDiff> {
  const recorder = requireRecorder(ctx)
  const recordNamespace = namespace || ctx.currentNamespace

  const history = await recorder.getHistory(historyId, recordNamespace)
  const snapshot = await recorder.getSnapshot(
    history.spec.snapshotRef,
    recordNamespace
  )

  const diff = ctx.comparator.compare(
    snapshot.spec.manifests,
    history.spec.manifests
  )
  if (!diff.hasDifferences) {
    core.info(`No differences between ${snapshot.metadata.name} and ${historyId}`)
  } else {
    core.info('Diff between before and after (filtered):')
    core.info(ctx.comparator.render(diff, { color: ctx.color }))
  }
  return diff
}

/**
 * `timeline` (or `diff` without an id): list recorded changes oldest first.
 */
export async function runTimeline(
  ctx: CommandContext,
  namespace: string
): Promise<HistoryRecord | undefined> {
  progress('Showing timeline of changes...')
  const recorder = requireRecorder(ctx)
  const histories = await recorder.listHistories(
    namespace || ctx.currentNamespace
  )
  return ctx.timeline.show(histories, ctx.prompt)
}

async function execute(
  ctx: CommandContext,
  label: string,
  args: string[]
): Promise<OutputAnalysis> {
  progress(`Executing kubectl ${args.join(' ')}`)
  const output = await ctx.runner.run(args)
  progress(`${label} operation completed successfully`)
  return analyzeOutput(output)
}

async function recordHistory(
  recorder: RecordCoordinator,
  manifest: string,
  snapshotRef: string,
  namespace: string,
  changes: ResourceChange[]
): Promise<string | undefined> {
  try {
    const historyName = await recorder.createHistory(
      manifest,
      snapshotRef,
      namespace,
      changes
    )
    progress(`History recorded successfully: ${historyName}`)
    return historyName
  } catch (error) {
    core.warning(`Could not create history: ${describeError(error)}`)
    return undefined
  }
}

async function resolveActualState(
  ctx: CommandContext,
  manifest: string,
  namespace: string
): Promise<string> {
  const actualState = await ctx.resolver.resolve(manifest, namespace)
  if (actualState === '') {
    core.warning('No resources could be identified, recording the manifest')
    return manifest
  }
  return actualState
}

async function captureBeforeDelete(
  ctx: CommandContext,
  options: DeleteOptions
): Promise<string> {
  try {
    return await ctx.runner.capture(
      buildKubectlArgs('get', {
        filenames: options.filenames,
        selector: options.selector,
        namespace: options.namespace,
        output: 'yaml',
        args: options.args
      })
    )
  } catch (error) {
    core.warning(`Could not capture current state: ${describeError(error)}`)
  }

  if (options.filenames.length > 0) {
    try {
      return await ctx.loader.load(options.filenames)
    } catch (error) {
      core.warning(`Could not read manifest files: ${describeError(error)}`)
    }
  }

  return options.args.length > 0
    ? `# Deleting resource: ${options.args.join(' ')}\n`
    : ''
}

async function captureResource(
  ctx: CommandContext,
  resource: string,
  namespace: string,
  fallback: string
): Promise<string> {
  try {
    return await ctx.runner.capture(
      buildKubectlArgs('get', { namespace, output: 'yaml', args: [resource] })
    )
  } catch (error) {
    core.warning(
      `Could not capture current state of ${resource}: ${describeError(error)}`
    )
    return fallback
  }
}

function recorderFor(ctx: CommandContext): RecordCoordinator | undefined {
  if (!ctx.recorder) {
    core.warning(
      `Could not create k8s client, skipping history recording: ${ctx.clientError?.message ?? 'no client configured'}`
    )
  }
  return ctx.recorder
}

function requireRecorder(ctx: CommandContext): RecordCoordinator {
  if (!ctx.recorder) {
    throw ctx.clientError ?? new ClientUnavailableError('no client configured')
  }
  return ctx.recorder
}

function progress(message: string): void {
  const time = new Date().toTimeString().slice(0, 8)
  core.info(`[${time}] ${message}`)
}
