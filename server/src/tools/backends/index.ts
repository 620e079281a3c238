import type { AppConfig } from '../../lib/config.js';
import { ToolGateway } from '../tool-gateway.js';
import { createGitHubBackend } from './github.js';
import { createHuggingFaceBackend } from './huggingface.js';
import { createKaggleBackend } from './kaggle.js';
import { createPerplexityBackend } from './perplexity.js';
import { createTavilyBackend } from './tavily.js';

/** Provider ids agents address through the gateway. */
export const PROVIDERS = {
  webSearch: 'web_search',
  marketData: 'market_data',
  businessAnalysis: 'business_analysis',
  datasetRegistry: 'dataset_registry',
  kaggleDatasets: 'kaggle_datasets',
  codeHost: 'code_host',
} as const;

/**
 * Build a gateway with every production backend registered.
 * Kaggle is only registered when its credentials are configured, since
 * ResourceAsset treats it as an optional extra source.
 */
export function createDefaultGateway(config: AppConfig): ToolGateway {
  const { credentials } = config;
  const gateway = new ToolGateway({ timeoutMs: config.pipeline.tool_timeout_ms });

  gateway
    .register(createTavilyBackend({
      id: PROVIDERS.webSearch,
      description: 'Tavily web search for company and industry profiles',
      apiKey: credentials.tavily_api_key,
      topic: 'general',
    }))
    .register(createTavilyBackend({
      id: PROVIDERS.marketData,
      description: 'Tavily news search for market and AI adoption trends',
      apiKey: credentials.tavily_api_key,
      topic: 'news',
    }))
    .register(createPerplexityBackend({
      id: PROVIDERS.businessAnalysis,
      description: 'Perplexity business analysis (competitors, use cases)',
      apiKey: credentials.perplexity_api_key,
    }))
    .register(createHuggingFaceBackend({
      id: PROVIDERS.datasetRegistry,
      description: 'Hugging Face dataset search',
      token: credentials.hf_token,
    }))
    .register(createGitHubBackend({
      id: PROVIDERS.codeHost,
      description: 'GitHub repository search',
      token: credentials.github_token,
    }));

  if (credentials.kaggle_username && credentials.kaggle_key) {
    gateway.register(createKaggleBackend({
      id: PROVIDERS.kaggleDatasets,
      description: 'Kaggle dataset search',
      username: credentials.kaggle_username,
      key: credentials.kaggle_key,
    }));
  }

  return gateway;
}
