/**
 * Print bet counts and performance from the database.
 */
import { loadConfig } from '../src/config.js';
import { createSql } from '../src/db/pool.js';
import { createBetRepository } from '../src/db/queries.js';

const config = loadConfig();
const sql = createSql(config.databaseUrl);
const repository = createBetRepository(sql);

const { overall, byLeague } = await repository.aggregateStats();
console.log('=== Overall ===');
console.log(`  Bets: ${overall.total} (${overall.wins}W / ${overall.losses}L / ${overall.pending} pending)`);
console.log(`  ROI: ${overall.roi}%  Win rate: ${overall.winRate}%`);
console.log(`  Avg value: ${overall.avgValuePct}%  Avg probability: ${overall.avgProbabilityPct}%`);

console.log('\n=== By league ===');
for (const l of byLeague) console.log(`  ${l.league}: ${l.total} bets, ${l.wins} won, avg value ${l.avgValuePct}%`);

const recent = await repository.listRecentBets(10);
console.log(`\n=== Last ${recent.length} bets ===`);
for (const b of recent) {
  const outcome = b.success === null ? 'pending' : b.success ? `won ${b.result ?? ''}` : `lost ${b.result ?? ''}`;
  console.log(`  ${b.match_date} ${b.home_team} vs ${b.away_team} | ${b.market} @ ${b.bk_odds} (${b.bookmaker}) ${outcome}`);
}

await sql.end();
