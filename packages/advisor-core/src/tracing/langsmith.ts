/**
 * LangSmith Integration
 *
 * Optional tracing of LangGraph executions through LangSmith.
 * Enable by setting LANGSMITH_API_KEY and LANGCHAIN_TRACING_V2=true;
 * LangChain picks these variables up itself, this module only reports them.
 */

import { createAgentLogger } from './agent-logger';

const log = createAgentLogger('LangSmith');

export interface LangSmithConfig {
  apiKey?: string;
  project?: string;
  endpoint?: string;
  enabled: boolean;
}

/**
 * Get LangSmith configuration from an environment map
 */
export function getLangSmithConfig(env: NodeJS.ProcessEnv = process.env): LangSmithConfig {
  const apiKey = env.LANGSMITH_API_KEY || env.LANGCHAIN_API_KEY;
  const project = env.LANGSMITH_PROJECT || env.LANGCHAIN_PROJECT || 'pension-advisor';
  const endpoint = env.LANGSMITH_ENDPOINT || env.LANGCHAIN_ENDPOINT;
  const tracingEnabled = env.LANGCHAIN_TRACING_V2 === 'true';

  return {
    apiKey,
    project,
    endpoint,
    enabled: !!apiKey && tracingEnabled,
  };
}

/**
 * Report LangSmith tracing status at application startup
 */
export function initLangSmith(env: NodeJS.ProcessEnv = process.env): boolean {
  const config = getLangSmithConfig(env);

  if (!config.enabled) {
    log.debug('LangSmith tracing is not enabled', {
      hasApiKey: !!config.apiKey,
      tracingEnabled: env.LANGCHAIN_TRACING_V2,
    });
    return false;
  }

  log.info('LangSmith tracing enabled', {
    project: config.project,
    endpoint: config.endpoint || 'default',
  });

  return true;
}
