import cliProgress from 'cli-progress'

export type ProgressPhase = 'download' | 'scrape' | 'absorb'

/**
 * One step of a batch pass. `current` counts finished items and never goes
 * backwards within a phase.
 */
export type ProgressEvent = {
  phase: ProgressPhase
  current: number
  total: number
  id?: string
}

export interface ProgressSink {
  report(event: ProgressEvent): void
}

/**
 * Configuration for progress bar display
 */
export type ProgressConfig = {
  /** Disable progress bars entirely */
  quiet?: boolean
  /** Custom format string for progress bars */
  format?: string
  /** Width of progress bar in characters (default: 40) */
  barSize?: number
  /** Frequency of progress updates in ms (default: 500) */
  updateFrequency?: number
  /** Output stream (default: stderr, leaving stdout to results) */
  stream?: NodeJS.WritableStream
}

const PHASE_LABELS: Record<ProgressPhase, string> = {
  download: 'Downloading thumbnails',
  scrape: 'Scraping metadata',
  absorb: 'Copying images',
}

/**
 * cli-progress multibar behind the ProgressSink interface. A bar is created
 * on the first event of a phase and stopped once it reaches its total.
 */
export class ProgressManager implements ProgressSink {
  private multiBar: cliProgress.MultiBar | null = null
  private bars: Map<ProgressPhase, cliProgress.SingleBar> = new Map()
  private values: Map<ProgressPhase, number> = new Map()
  private readonly isQuiet: boolean
  private readonly format: string
  private readonly barSize: number
  private readonly updateFrequency: number
  private readonly stream: NodeJS.WritableStream
  private readonly onSignal = () => {
    this.stopAll()
    process.exit(130)
  }

  constructor(config: ProgressConfig = {}) {
    this.isQuiet = config.quiet ?? false
    this.barSize = config.barSize ?? 40
    this.updateFrequency = config.updateFrequency ?? 500
    this.stream = config.stream ?? process.stderr

    // [████████░░░░░░░░░░░░] 35% | 12/34 | ETA: 12s | dQw4w9WgXcQ
    this.format = config.format ?? `{name} [{bar}] {percentage}% | {value}/{total} | ETA: {eta}s | {current}`
  }

  public report(event: ProgressEvent): void {
    const previous = this.values.get(event.phase) ?? 0
    const value = Math.min(Math.max(previous, event.current), event.total)
    this.values.set(event.phase, value)

    if (!this.isQuiet) {
      const bar = this.bars.get(event.phase) ?? this.createBar(event.phase, event.total)
      bar.update(value, { current: event.id ? this.truncate(event.id, 40) : '' })
    }

    if (value >= event.total) {
      this.stopBar(event.phase)
    }
  }

  /**
   * Last reported value for a phase (0 to total)
   */
  public getProgress(phase: ProgressPhase): number {
    return this.values.get(phase) ?? 0
  }

  public isVisible(): boolean {
    return !this.isQuiet
  }

  public stopBar(phase: ProgressPhase): void {
    const bar = this.bars.get(phase)
    if (bar) {
      bar.stop()
      this.bars.delete(phase)
    }
    if (this.bars.size === 0) {
      this.stopAll()
    }
  }

  /**
   * Stop all progress bars and cleanup
   */
  public stopAll(): void {
    for (const bar of this.bars.values()) {
      bar.stop()
    }
    this.bars.clear()
    if (this.multiBar) {
      this.multiBar.stop()
      this.multiBar = null
      process.off('SIGINT', this.onSignal)
      process.off('SIGTERM', this.onSignal)
    }
  }

  private createBar(phase: ProgressPhase, total: number): cliProgress.SingleBar {
    if (!this.multiBar) {
      this.multiBar = new cliProgress.MultiBar(
        {
          clearOnComplete: false,
          hideCursor: true,
          format: this.format,
          barCompleteChar: '█',
          barIncompleteChar: '░',
          barsize: this.barSize,
          fps: 1000 / this.updateFrequency,
          stream: this.stream,
        },
        cliProgress.Presets.shades_classic,
      )
      // Restore the cursor on Ctrl+C
      process.on('SIGINT', this.onSignal)
      process.on('SIGTERM', this.onSignal)
    }

    const bar = this.multiBar.create(total, 0, {
      name: this.padName(PHASE_LABELS[phase]),
      current: 'starting...',
    })
    this.bars.set(phase, bar)
    return bar
  }

  private padName(name: string): string {
    const maxLen = 25
    if (name.length >= maxLen) {
      return name.substring(0, maxLen - 3) + '...'
    }
    return name.padEnd(maxLen)
  }

  private truncate(str: string, maxLen: number): string {
    if (str.length <= maxLen) {
      return str
    }
    return str.substring(0, maxLen - 3) + '...'
  }
}

/**
 * Create a progress manager instance with common defaults
 */
export function createProgressManager(quiet?: boolean): ProgressManager {
  return new ProgressManager({ quiet: quiet ?? false })
}
