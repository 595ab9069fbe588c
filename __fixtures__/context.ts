import * as path from 'path'
import type { CommandContext } from '../src/commands.js'
import { KubectlRunner } from '../src/kubectl-runner.js'
import { ManifestComparator } from '../src/manifest-comparator.js'
import { ManifestLoader } from '../src/manifest-loader.js'
import { RecordCoordinator } from '../src/record-coordinator.js'
import { ClusterStateResolver, KubectlStateReader } from '../src/state-resolver.js'
import { TimelineView } from '../src/timeline-view.js'
import { FakeLauncher, collectingSink, type FakeResult } from './launcher.js'
import { InMemoryRecordStore } from './record-store.js'

export const MANIFESTS = path.join(__dirname, 'manifests')

export const NOW = new Date('2026-10-19T08:30:00Z')

export interface TestContext {
  ctx: CommandContext
  launcher: FakeLauncher
  store: InMemoryRecordStore
  recorder: RecordCoordinator
  /** Everything kubectl printed through the runner */
  output: () => string
}

/**
 * Command context wired to a fake kubectl and an in-memory store. Records
 * go to the `default` namespace unless a command names another.
 */
export function createTestContext(
  respond: (args: readonly string[]) => FakeResult = () => ({})
): TestContext {
  const launcher = new FakeLauncher(respond)
  const { sink, output } = collectingSink()
  const runner = new KubectlRunner({ launch: launcher.launch, sink })
  const store = new InMemoryRecordStore()
  const recorder = new RecordCoordinator({
    store,
    appliedBy: 'tester',
    now: () => NOW
  })

  const ctx: CommandContext = {
    runner,
    loader: new ManifestLoader(MANIFESTS),
    resolver: new ClusterStateResolver(new KubectlStateReader(runner)),
    comparator: new ManifestComparator(),
    timeline: new TimelineView(),
    recorder,
    currentNamespace: 'default'
  }

  return { ctx, launcher, store, recorder, output }
}
