export class Semaphore {
  private available: number
  private queue: Array<() => void> = []
  private readonly capacity: number

  constructor(limit: number) {
    this.available = Math.max(1, Math.floor(limit || 1))
    this.capacity = this.available
  }

  get used() {
    return this.capacity - this.available
  }

  get pending() {
    return this.queue.length
  }

  get limit() {
    return this.capacity
  }

  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available -= 1
      return this.releaseOnce()
    }
    await new Promise<void>((resolve) => this.queue.push(resolve))
    this.available -= 1
    return this.releaseOnce()
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await fn()
    } finally {
      release()
    }
  }

  private releaseOnce() {
    let released = false
    return () => {
      if (released) return
      released = true
      this.release()
    }
  }

  private release() {
    this.available += 1
    if (this.available > this.capacity) this.available = this.capacity
    const next = this.queue.shift()
    if (next) next()
  }
}

function readPositiveInt(raw: string | undefined, fallback: number) {
  const parsed = Number.parseInt(raw || '', 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

// Process-wide gate for research runs; each run holds one slot for its whole duration.
export const researchSemaphore = new Semaphore(readPositiveInt(process.env.RESEARCH_CONCURRENCY, 2))

export const RESEARCH_MAX_PENDING = readPositiveInt(process.env.RESEARCH_MAX_PENDING, 16)

export async function withResearchConcurrency<T>(fn: () => Promise<T>) {
  return researchSemaphore.run(fn)
}

export function isBacklogFull() {
  return researchSemaphore.pending >= RESEARCH_MAX_PENDING
}

export function backlogSnapshot() {
  return { used: researchSemaphore.used, pending: researchSemaphore.pending, limit: RESEARCH_MAX_PENDING }
}
