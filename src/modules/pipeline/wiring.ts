/**
 * Composition root: builds every service from a loaded config.
 *
 * Services take their collaborators as constructor dependencies; this is
 * the only place that picks concrete implementations.
 */

import { createEventBus, type TypedEventBus } from '../../core/event-bus.js'
import type { Mode } from '../../core/types.js'
import { createAgentRunner } from '../agent/agent-runner-impl.js'
import { createBlockerGate } from '../blocker-gate/blocker-gate-impl.js'
import { CommandCredentialProbe } from '../blocker-gate/credential-probe.js'
import type { CodeHost } from '../code-host/code-host.js'
import { createGhCodeHost } from '../code-host/gh-code-host.js'
import type { ShiplineConfig } from '../config/config-schema.js'
import { AgentCommitClassifier } from '../divergence/commit-classifier.js'
import { createDivergenceClassifier } from '../divergence/divergence-classifier-impl.js'
import { createNotesStore, type NotesStore } from '../notes/notes-store.js'
import { CommandNotificationSink, LogNotificationSink, type NotificationSink } from '../notifications/notification-sink.js'
import { Notifier } from '../notifications/notifier.js'
import { createPrompter, type Prompter } from '../prompter/prompter.js'
import { createSessionTracker } from '../session-tracker/session-tracker-impl.js'
import type { SessionTracker } from '../session-tracker/session-tracker.js'
import { createStaleBranchManager } from '../stale-branch/stale-branch-manager-impl.js'
import type { StaleBranchManager } from '../stale-branch/stale-branch-manager.js'
import { createStateResolver } from '../state-resolver/state-resolver-impl.js'
import type { StateResolver } from '../state-resolver/state-resolver.js'
import { createGitClient } from '../vcs/git-client-impl.js'
import type { GitClient } from '../vcs/git-client.js'
import type { Pipeline } from './pipeline.js'
import { createPipeline } from './pipeline-impl.js'

export interface ShiplineContextOptions {
  config: ShiplineConfig
  repoRoot: string
  mode: Mode
  env?: NodeJS.ProcessEnv
  /** Defaults to a readline prompter in attended mode; unattended never prompts */
  prompter?: Prompter
}

export interface ShiplineContext {
  config: ShiplineConfig
  repoRoot: string
  mode: Mode
  eventBus: TypedEventBus
  git: GitClient
  codeHost: CodeHost
  session: SessionTracker
  notes: NotesStore
  notifier: Notifier
  resolver: StateResolver
  stale: StaleBranchManager
  prompter: Prompter | undefined
  pipeline: Pipeline
}

export function createShiplineContext(options: ShiplineContextOptions): ShiplineContext {
  const { config, repoRoot, mode } = options
  const env = options.env ?? process.env
  const prompter = mode === 'attended' ? (options.prompter ?? createPrompter()) : undefined

  const eventBus = createEventBus()
  const git = createGitClient({ cwd: repoRoot, remote: config.remote, env })
  const codeHost = createGhCodeHost({ cwd: repoRoot, env })
  const session = createSessionTracker({
    repoRoot,
    dataDir: config.data_dir,
    limits: config.session,
    git,
    eventBus,
  })

  const sinks: NotificationSink[] = [new LogNotificationSink()]
  if (config.notifications.command !== null) {
    sinks.push(new CommandNotificationSink({ command: config.notifications.command, args: config.notifications.args, env }))
  }
  const notifier = new Notifier(sinks, session)

  const agent = createAgentRunner(config.agent, env)
  const resolver = createStateResolver({ codeHost, git, markers: config.markers, eventBus })
  const divergence = createDivergenceClassifier({
    git,
    codeHost,
    classifier: new AgentCommitClassifier(agent),
    mainline: config.mainline,
    assessmentTag: config.markers.assessment,
    prompter,
    notifier,
    eventBus,
  })
  const gate = createBlockerGate({
    patterns: config.blockers,
    credentials: config.credentials,
    probe: new CommandCredentialProbe({ command: config.credentials.command, args: config.credentials.args, env }),
    session,
    prompter,
    eventBus,
  })
  const stale = createStaleBranchManager({
    git,
    codeHost,
    session,
    divergence,
    mainline: config.mainline,
    threshold: config.stale.threshold,
    prompter,
    eventBus,
  })
  const notes = createNotesStore({ repoRoot, dataDir: config.data_dir, limits: config.notes })

  const pipeline = createPipeline({
    config,
    repoRoot,
    mode,
    git,
    codeHost,
    resolver,
    divergence,
    gate,
    stale,
    session,
    notes,
    notifier,
    agent,
    eventBus,
  })

  return { config, repoRoot, mode, eventBus, git, codeHost, session, notes, notifier, resolver, stale, prompter, pipeline }
}
