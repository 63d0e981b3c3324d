/**
 * Market data tools backed by Yahoo Finance's public JSON endpoints.
 *
 * Each capability is a separate tool so a team can expose only what its
 * agents need; the enabling flags come from the tool options.
 */
import { createTool, type Tool } from '@inngest/agent-kit';
import { z } from 'zod';
import { fetchJson } from './http';

const CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';
const SUMMARY_URL = 'https://query2.finance.yahoo.com/v10/finance/quoteSummary';
const SEARCH_URL = 'https://query1.finance.yahoo.com/v1/finance/search';

export interface YFinanceFlags {
  stockPrice: boolean;
  analystRecommendations: boolean;
  companyInfo: boolean;
  companyNews: boolean;
  historicalPrices: boolean;
}

const symbolParameter = z.string().describe('Ticker symbol, e.g. AAPL');

const chartSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({
            symbol: z.string(),
            currency: z.string().optional(),
            regularMarketPrice: z.number().optional(),
            previousClose: z.number().optional(),
            chartPreviousClose: z.number().optional(),
          }),
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({
                open: z.array(z.number().nullable()).optional(),
                high: z.array(z.number().nullable()).optional(),
                low: z.array(z.number().nullable()).optional(),
                close: z.array(z.number().nullable()).optional(),
                volume: z.array(z.number().nullable()).optional(),
              })
            ),
          }),
        })
      )
      .nullable(),
  }),
});

const summarySchema = z.object({
  quoteSummary: z.object({
    result: z.array(z.record(z.string(), z.unknown())).nullable(),
  }),
});

const searchSchema = z.object({
  news: z
    .array(
      z.object({
        title: z.string(),
        publisher: z.string().optional(),
        link: z.string().optional(),
        providerPublishTime: z.number().optional(),
      })
    )
    .default([]),
});

function normalizeSymbol(symbol: string): string {
  return encodeURIComponent(symbol.trim().toUpperCase());
}

async function quoteSummary(symbol: string, modules: string[]) {
  const params = new URLSearchParams({ modules: modules.join(',') });
  const result = await fetchJson(`${SUMMARY_URL}/${normalizeSymbol(symbol)}?${params.toString()}`, summarySchema);
  if (!result.ok) return { error: result.error, symbol };

  const [first] = result.data.quoteSummary.result ?? [];
  return first ? { symbol, ...first } : { error: `No data for ${symbol}`, symbol };
}

const stockPriceTool = createTool({
  name: 'get_stock_price',
  description: 'Get the current market price of a stock.',
  parameters: z.object({ symbol: symbolParameter }),
  handler: async ({ symbol }) => {
    const params = new URLSearchParams({ range: '1d', interval: '1d' });
    const result = await fetchJson(`${CHART_URL}/${normalizeSymbol(symbol)}?${params.toString()}`, chartSchema);
    if (!result.ok) return { error: result.error, symbol };

    const [chart] = result.data.chart.result ?? [];
    if (!chart || chart.meta.regularMarketPrice === undefined) {
      return { error: `No price for ${symbol}`, symbol };
    }
    return {
      symbol: chart.meta.symbol,
      price: chart.meta.regularMarketPrice,
      currency: chart.meta.currency ?? null,
      previousClose: chart.meta.previousClose ?? chart.meta.chartPreviousClose ?? null,
    };
  },
});

const analystRecommendationsTool = createTool({
  name: 'get_analyst_recommendations',
  description: 'Get the analyst recommendation trend (strong buy to strong sell counts) for a stock.',
  parameters: z.object({ symbol: symbolParameter }),
  handler: async ({ symbol }) => quoteSummary(symbol, ['recommendationTrend']),
});

const companyInfoTool = createTool({
  name: 'get_company_info',
  description: 'Get the company profile, sector, industry and key figures for a stock.',
  parameters: z.object({ symbol: symbolParameter }),
  handler: async ({ symbol }) => quoteSummary(symbol, ['assetProfile', 'price', 'summaryDetail']),
});

const companyNewsTool = createTool({
  name: 'get_company_news',
  description: 'Get recent news headlines about a company.',
  parameters: z.object({
    symbol: symbolParameter,
    limit: z.number().int().min(1).max(20).optional().default(5).describe('Number of stories'),
  }),
  handler: async ({ symbol, limit }) => {
    const params = new URLSearchParams({ q: symbol.trim(), newsCount: String(limit ?? 5), quotesCount: '0' });
    const result = await fetchJson(`${SEARCH_URL}?${params.toString()}`, searchSchema);
    if (!result.ok) return { error: result.error, symbol };

    return {
      symbol,
      news: result.data.news.map((story) => ({
        title: story.title,
        publisher: story.publisher ?? null,
        link: story.link ?? null,
        publishedAt: story.providerPublishTime
          ? new Date(story.providerPublishTime * 1000).toISOString()
          : null,
      })),
    };
  },
});

const historicalPricesTool = createTool({
  name: 'get_historical_prices',
  description: 'Get daily closing prices for a stock over a period.',
  parameters: z.object({
    symbol: symbolParameter,
    period: z
      .enum(['5d', '1mo', '3mo', '6mo', '1y', '5y'])
      .optional()
      .default('1mo')
      .describe('Lookback period'),
  }),
  handler: async ({ symbol, period }) => {
    const params = new URLSearchParams({ range: period ?? '1mo', interval: '1d' });
    const result = await fetchJson(`${CHART_URL}/${normalizeSymbol(symbol)}?${params.toString()}`, chartSchema);
    if (!result.ok) return { error: result.error, symbol };

    const [chart] = result.data.chart.result ?? [];
    const timestamps = chart?.timestamp ?? [];
    const closes = chart?.indicators.quote[0]?.close ?? [];
    return {
      symbol,
      period,
      prices: timestamps.map((timestamp, index) => ({
        date: new Date(timestamp * 1000).toISOString().slice(0, 10),
        close: closes[index] ?? null,
      })),
    };
  },
});

/**
 * Tools enabled by the given flags, in a fixed order.
 */
export function createYFinanceTools(flags: YFinanceFlags): Tool.Any[] {
  const tools: Tool.Any[] = [];
  if (flags.stockPrice) tools.push(stockPriceTool);
  if (flags.analystRecommendations) tools.push(analystRecommendationsTool);
  if (flags.companyInfo) tools.push(companyInfoTool);
  if (flags.companyNews) tools.push(companyNewsTool);
  if (flags.historicalPrices) tools.push(historicalPricesTool);
  return tools;
}
