import type { ProviderConfig } from '../config.js';
import type { FootballDataProvider } from '../types/services.js';
import { createApiSportsClient } from './api-sports.js';
import { createOddsApiClient } from './odds-api.js';

export function createFootballDataProvider(config: ProviderConfig): FootballDataProvider {
  const sports = createApiSportsClient({ apiKey: config.apiSportsKey, timeoutMs: config.timeoutMs });
  const odds = createOddsApiClient({ apiKey: config.oddsApiKey, timeoutMs: config.timeoutMs });

  return {
    fetchFixtures: sports.fetchFixtures,
    fetchStandings: sports.fetchStandings,
    fetchFixtureResult: sports.fetchFixtureResult,
    fetchOdds: odds.fetchOdds,
  };
}

export { ProviderError } from './http-client.js';
