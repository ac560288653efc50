import type { ProgressState, StepOutcome } from './types.js'

const BAR_WIDTH = 20

export function createProgressState(totalSteps: number): ProgressState {
  return { totalSteps, currentStep: 0, installedCount: 0 }
}

export function advanceProgress(state: ProgressState, outcome: StepOutcome): ProgressState {
  const installed = outcome === 'installed' || outcome === 'unverified'
  return {
    totalSteps: state.totalSteps,
    currentStep: Math.min(state.currentStep + 1, state.totalSteps),
    installedCount: state.installedCount + (installed ? 1 : 0)
  }
}

export function renderProgressBar(state: ProgressState, label?: string, width = BAR_WIDTH): string {
  const ratio = state.totalSteps === 0 ? 1 : state.currentStep / state.totalSteps
  const filled = Math.round(ratio * width)
  const bar = '#'.repeat(filled) + '-'.repeat(width - filled)
  const base = `[${bar}] ${state.currentStep}/${state.totalSteps} installed: ${state.installedCount}`
  return label ? `${base} ${label}` : base
}

export interface ProgressSink {
  write: (chunk: string) => unknown
  isTTY?: boolean
}

export interface ProgressReporter {
  update(state: ProgressState, label?: string): void
  // Wipes the current line so other output can be printed cleanly.
  clear(): void
  done(): void
}

/** Single-line, carriage-return-overwritten progress; silent when not a TTY. */
export function createProgressReporter(sink: ProgressSink, enabled: boolean): ProgressReporter {
  const active = enabled && Boolean(sink.isTTY)
  let lastLength = 0

  const clear = () => {
    if (!active || lastLength === 0) return
    sink.write(`\r${' '.repeat(lastLength)}\r`)
    lastLength = 0
  }

  return {
    update(state, label) {
      if (!active) return
      const line = renderProgressBar(state, label)
      const padding = lastLength > line.length ? ' '.repeat(lastLength - line.length) : ''
      sink.write(`\r${line}${padding}`)
      lastLength = line.length
    },
    clear,
    done() {
      clear()
    }
  }
}
