import {
  ReaderReportMessageSchema,
  type CandidateDocument,
  type ReaderReport,
  type ReaderReportStatus
} from '@deepseeker/shared'
import { Semaphore } from '../utils/concurrency'
import { invokeAndDecode, type AgentCallContext, type AgentInvoker, type AgentMessage } from './agent-invoker'
import { isTransportFailure, type DocumentFetcher, type ExtractedDocument, type FetchResult } from './document-fetcher'
import { describeError } from './logger'

export type ReaderDispatchInput = {
  question: string
  round: number
  documents: CandidateDocument[]
  concurrency: number
  signal?: AbortSignal
}

export type ReaderDispatchContext = Omit<AgentCallContext, 'documentId'>

export const ABANDONED_NOTE = 'abandoned: run deadline or cancellation reached before this document finished'

const READER_SYSTEM_PROMPT = [
  'You are a research reader. You read ONE web document and report how it bears on the user question.',
  'Be short and factual. Do not speculate beyond the document. Quote minimally.',
  '',
  'Respond with exactly one ```json fenced block and nothing else, shaped as:',
  '{',
  '  "title": string,              // the document title',
  '  "summary": string,            // at most 120 words',
  '  "key_points": string[],       // at most 6 terse bullets',
  '  "relevance_score": number,    // 0 (irrelevant) to 1 (directly answers the question)',
  '  "notes": string | null        // caveats such as paywalls, stale dates or conflicts',
  '}'
].join('\n')

export function buildReaderMessages(
  question: string,
  document: CandidateDocument,
  extracted: Pick<ExtractedDocument, 'text' | 'title'>
): AgentMessage[] {
  const header = [
    `QUESTION: ${question}`,
    `DOCUMENT ID: ${document.id}`,
    `URL: ${document.url}`,
    `TITLE: ${extracted.title ?? document.title}`,
    document.source.publishedHint ? `PUBLISHED (approx.): ${document.source.publishedHint}` : null
  ].filter((line): line is string => line !== null)
  return [
    { role: 'system', content: READER_SYSTEM_PROMPT },
    { role: 'user', content: `${header.join('\n')}\n\nCONTENT:\n${extracted.text}` }
  ]
}

function degradedReport(
  round: number,
  document: CandidateDocument,
  status: Exclude<ReaderReportStatus, 'ok'>,
  notes: string
): ReaderReport {
  return {
    entryId: `${round}:${document.id}`,
    round,
    documentId: document.id,
    url: document.url,
    title: document.title,
    summary: '',
    keyPoints: [],
    relevanceScore: 0,
    notes,
    status
  }
}

type AbortBarrier = { reached: Promise<void>; release: () => void }

/** Settles when `signal` aborts; `release` detaches the listener once the round is over. */
function abortBarrier(signal: AbortSignal | undefined): AbortBarrier | null {
  if (!signal) return null
  if (signal.aborted) return { reached: Promise.resolve(), release: () => undefined }
  let onAbort: () => void = () => undefined
  const reached = new Promise<void>((resolve) => {
    onAbort = () => resolve()
    signal.addEventListener('abort', onAbort, { once: true })
  })
  return { reached, release: () => signal.removeEventListener('abort', onAbort) }
}

type ReaderDispatcherDeps = {
  invoker: AgentInvoker
  fetcher: DocumentFetcher
}

/**
 * Fans a round's selection out to reader agents with bounded concurrency.
 * Every selected document yields exactly one report, in selection order.
 */
export class ReaderDispatcher {
  constructor(private readonly deps: ReaderDispatcherDeps) {}

  async dispatch(input: ReaderDispatchInput, ctx: ReaderDispatchContext): Promise<ReaderReport[]> {
    const semaphore = new Semaphore(input.concurrency)
    const barrier = abortBarrier(input.signal)

    const pipelines = input.documents.map((document) => {
      const pipeline = semaphore.run(() => this.readOne(input, document, ctx))
      if (!barrier) return pipeline
      // The barrier releases on abort; a pipeline still running is discarded.
      pipeline.catch(() => undefined)
      const abandoned = barrier.reached.then(() => degradedReport(input.round, document, 'fetch_failed', ABANDONED_NOTE))
      return Promise.race([pipeline, abandoned])
    })

    try {
      return await Promise.all(pipelines)
    } finally {
      barrier?.release()
    }
  }

  private async readOne(
    input: ReaderDispatchInput,
    document: CandidateDocument,
    ctx: ReaderDispatchContext
  ): Promise<ReaderReport> {
    const { round, signal } = input
    const abandoned = () => degradedReport(round, document, 'fetch_failed', ABANDONED_NOTE)
    if (signal?.aborted) return abandoned()

    let fetched: FetchResult
    try {
      fetched = await this.deps.fetcher.fetchAndExtract(document, { signal })
    } catch (error) {
      if (signal?.aborted) return abandoned()
      ctx.trace.record({
        type: 'error',
        kind: 'fetch',
        stage: 'fetch',
        documentId: document.id,
        reason: 'network_error',
        message: describeError(error)
      })
      return degradedReport(round, document, 'fetch_failed', `network_error: ${describeError(error)}`)
    }

    if (!fetched.ok) {
      if (signal?.aborted) return abandoned()
      const { error } = fetched
      ctx.trace.record({
        type: 'error',
        kind: 'fetch',
        stage: 'fetch',
        documentId: document.id,
        reason: error.reason,
        message: error.message
      })
      const status = isTransportFailure(error.reason) ? 'fetch_failed' : 'parse_failed'
      return degradedReport(round, document, status, `${error.reason}: ${error.message}`)
    }
    if (signal?.aborted) return abandoned()

    const result = await invokeAndDecode(
      this.deps.invoker,
      {
        role: 'reader',
        stage: 'read',
        messages: buildReaderMessages(input.question, document, fetched),
        signal
      },
      ReaderReportMessageSchema,
      { ...ctx, documentId: document.id }
    )

    if (!result.ok) {
      if (signal?.aborted) return abandoned()
      return degradedReport(round, document, 'agent_malformed', `${result.failure.reason}: ${result.failure.detail}`)
    }

    const message = result.message
    const report: ReaderReport = {
      entryId: `${round}:${document.id}`,
      round,
      documentId: document.id,
      url: document.url,
      title: message.title.trim() || fetched.title || document.title,
      summary: message.summary.trim(),
      keyPoints: message.key_points.map((point) => point.trim()).filter(Boolean),
      relevanceScore: message.relevance_score,
      notes: message.notes?.trim() || null,
      status: 'ok'
    }
    return report
  }
}
