import { configureLogger, log } from '@shared/logger'
import { render, type Instance } from 'ink'
import { loadConfiguration, loadDotenv } from './config'
import { createVcsFacade } from './node/adapters/vcs'
import { EventLoop } from './node/runtime/EventLoop'
import { RepoWatcher } from './node/services/RepoWatcherService'
import { ConfigError, formatError } from './node/shared/errors'
import { createAppState } from './node/state/create-app-state'
import { ConfigStore, createPersistenceObserver } from './node/store'
import { App } from './tui/App'

export async function main(): Promise<void> {
  loadDotenv()
  const config = loadConfiguration()
  // Ink owns the terminal; without a log file nothing may reach the console.
  configureLogger({ level: config.logLevel, filePath: config.logFile, silent: !config.logFile })

  const facade = createVcsFacade({ repoPath: config.repoPath, jjBinary: config.jjBinary })
  const workspaceRoot = await facade.workspaceRoot()
  log.info(`[main] Starting in ${workspaceRoot ?? config.repoPath}`)

  const store = new ConfigStore()
  const state = createAppState({
    hasRepo: workspaceRoot !== null,
    graphLimit: config.graphLimit,
    recentFilters: store.getRecentFilters(),
    themeName: store.getThemeName()
  })

  let app: Instance | null = null
  let handingOff = false

  const mount = (): Instance => {
    const instance = render(<App loop={loop} repoPath={config.repoPath} />, { exitOnCtrlC: false })
    instance.waitUntilExit().then(
      () => {
        if (!handingOff) loop.dispatch({ kind: 'quit' })
      },
      (error: unknown) => {
        log.error('[main] Renderer failed:', error)
        loop.dispatch({ kind: 'quit' })
      }
    )
    return instance
  }

  // The merge tool needs the raw terminal, so Ink steps aside until it exits.
  const handoff = async <T,>(task: () => Promise<T>): Promise<T> => {
    handingOff = true
    app?.clear()
    app?.unmount()
    try {
      return await task()
    } finally {
      handingOff = false
      app = mount()
    }
  }

  const loop = new EventLoop({
    state,
    facade,
    tickMs: config.tickMs,
    diffConcurrency: config.diffConcurrency,
    handoff
  })
  loop.subscribe(createPersistenceObserver(store, state))

  const watcher = new RepoWatcher()
  const onExternalChange = () => loop.dispatch({ kind: 'externalChangeDetected' })
  if (workspaceRoot) {
    watcher.watch(workspaceRoot, onExternalChange)
  } else {
    // Start watching once `jj git init` has created the workspace.
    const unsubscribe = loop.subscribe((current) => {
      if (!current.repo) return
      unsubscribe()
      facade
        .workspaceRoot()
        .then((root) => {
          if (root) watcher.watch(root, onExternalChange)
        })
        .catch((error: unknown) => log.warn('[main] Cannot locate new workspace:', error))
    })
  }

  app = mount()
  try {
    await loop.start()
  } finally {
    watcher.stop()
    await loop.stop()
    app?.unmount()
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`)
  } else {
    log.error('[main] Fatal error:', error)
    console.error(formatError(error))
  }
  process.exitCode = 1
})
