import { OpenAiAgentInvoker, type AgentInvoker } from './agent-invoker'
import { HttpDocumentFetcher, type DocumentFetcher } from './document-fetcher'
import { PlannerStage } from './planner-stage'
import { ReaderDispatcher } from './reader-dispatcher'
import { ResearchLoopController } from './research-loop-controller'
import { BingSearchGateway, type SearchGateway } from './search-gateway'

export type ResearchComponents = {
  invoker?: AgentInvoker
  search?: SearchGateway
  fetcher?: DocumentFetcher
}

let cachedController: ResearchLoopController | null = null

export function createResearchController(components: ResearchComponents = {}) {
  const invoker = components.invoker ?? new OpenAiAgentInvoker()
  return new ResearchLoopController({
    planner: new PlannerStage(invoker),
    search: components.search ?? new BingSearchGateway(),
    dispatcher: new ReaderDispatcher({ invoker, fetcher: components.fetcher ?? new HttpDocumentFetcher() })
  })
}

export function getResearchController(): ResearchLoopController {
  if (!cachedController) {
    cachedController = createResearchController()
  }
  return cachedController
}

/** Replaces the process-wide controller; pass null to rebuild from the environment on next use. */
export function setResearchController(controller: ResearchLoopController | null) {
  cachedController = controller
}
