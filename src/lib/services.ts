import { getConfig, type AppConfig } from '@/lib/config'
import { EventLog } from '@/lib/event-log'
import { GeminiOverviewClient, type OverviewModel } from '@/lib/gemini'
import { OverviewOrchestrator } from '@/lib/overview'
import { SearchService } from '@/lib/search'

export interface Services {
  config: AppConfig
  eventLog: EventLog
  search: SearchService
}

export function createServices(config: AppConfig, model?: OverviewModel): Services {
  const eventLog = new EventLog(config.logsDir)
  const orchestrator = new OverviewOrchestrator(new GeminiOverviewClient(config, model))
  return {
    config,
    eventLog,
    search: new SearchService(config, orchestrator, eventLog),
  }
}

let services: Services | null = null

export function getServices(): Services {
  if (!services) {
    const config = getConfig()
    services = createServices(config)
    console.log(
      `[Services] Overview mode: ${config.geminiApiKey ? `Gemini (${config.geminiModel})` : 'heuristic only'}; logs in ${config.logsDir}`
    )
  }
  return services
}
