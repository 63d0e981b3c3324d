import type { Tool } from '@inngest/agent-kit';
import type { ToolOptions } from '../../../types/hierarchy';
import type { ToolFactory } from '../../registry';
import { createDuckDuckGoSearchTool } from './duckduckgo';
import { createYFinanceTools } from './yfinance';

function flag(options: ToolOptions, key: string): boolean {
  const value = options[key];
  return value === true || value === 'true';
}

function positiveInt(options: ToolOptions, key: string, fallback: number): number {
  const value = Number(options[key]);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

export const duckDuckGoToolFactory: ToolFactory<Tool.Any> = {
  defaults: { max_results: 5 },
  create: (options) => [createDuckDuckGoSearchTool(positiveInt(options, 'max_results', 5))],
};

export const yFinanceToolFactory: ToolFactory<Tool.Any> = {
  defaults: {
    stock_price: true,
    analyst_recommendations: true,
    company_info: true,
    company_news: true,
    historical_prices: false,
  },
  create: (options) =>
    createYFinanceTools({
      stockPrice: flag(options, 'stock_price'),
      analystRecommendations: flag(options, 'analyst_recommendations'),
      companyInfo: flag(options, 'company_info'),
      companyNews: flag(options, 'company_news'),
      historicalPrices: flag(options, 'historical_prices'),
    }),
};

export { createDuckDuckGoSearchTool, createYFinanceTools };
