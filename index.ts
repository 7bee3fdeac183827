import { config as loadEnvFile } from 'dotenv';
import { parseArgs } from './utils.ts';
import type { Item } from './types.ts';
import { ConfigError, loadConfig } from './config.ts';
import { GitHubApiError, GitHubMetricsClient } from './github.ts';
import { calculateOverallMetrics, getPerItemMetrics } from './metrics.ts';
import { displayConsoleOutput, displaySummary, writeReports } from './output.ts';
import { isDiscussionQuery } from './search.ts';

function describeList(values: string[]): string {
  return values.length > 0 ? values.join(', ') : 'none';
}

async function main() {
  try {
    // Parse command line arguments
    const { envFile, query } = parseArgs();

    console.log('🚀 Issue Engagement Metrics\n');

    // Load configuration
    console.log(`Loading environment from ${envFile}...`);
    loadEnvFile({ path: envFile });
    const config = loadConfig(process.env, query);

    console.log(`✓ Configuration loaded`);
    console.log(`  Search query: ${config.searchQuery}`);
    console.log(`  Ignored users: ${describeList(config.metrics.ignoreUsers)}`);
    console.log(`  Labels measured: ${describeList(config.metrics.labelsToMeasure)}`);
    if (config.enterpriseUrl) {
      console.log(`  GitHub Enterprise: ${config.enterpriseUrl}`);
    }

    const client = new GitHubMetricsClient(config);

    // Check rate limit before starting
    await client.checkRateLimit();
    console.log('');

    let items: Item[];
    if (isDiscussionQuery(config.searchQuery)) {
      items = await client.searchDiscussions(config.searchQuery);
    } else {
      const results = await client.searchItems(config.searchQuery);
      items = await client.fetchIssueItems(results);
    }

    if (items.length === 0) {
      console.log('⚠️  No issues found for the given search criteria.');
    } else {
      console.log(`\n✓ Total items analyzed: ${items.length}`);
    }

    // Calculate metrics
    const perItem = getPerItemMetrics(items, config.metrics);
    const report = calculateOverallMetrics(perItem, config.metrics, config.searchQuery);

    displayConsoleOutput(report, config);

    const paths = await writeReports(report, config);
    displaySummary(paths);

    // Check rate limit after completion
    await client.checkRateLimit();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`\n❌ Error: ${message}`);

    if (message.toLowerCase().includes('rate limit')) {
      console.log('\n⚠️  Hit API rate limit. Wait for the reset time and try again.');
      console.log('   Narrow the search query to reduce API calls.');
    } else if (!(error instanceof ConfigError) && !(error instanceof GitHubApiError) && error instanceof Error) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}

// Show help message
if (process.argv.includes('--help') || process.argv.includes('-h')) {
  console.log(`
Issue Engagement Metrics

Usage:
  npm start -- [options]

Options:
  --query QUERY        GitHub search query (overrides SEARCH_QUERY)
  --env-file PATH      Path to an environment file (default: ./.env)
  --help, -h           Show this help message

Examples:
  npm start
  npm start -- --query "repo:octo-org/octo-repo is:issue created:2024-05-01..2024-05-31"
  npm start -- --env-file ./metrics.env

Configuration:
  Set these in the environment or in the .env file:
    GH_TOKEN             personal access token (required)
    SEARCH_QUERY         GitHub search query (required unless --query is given)
    GH_ENTERPRISE_URL    GitHub Enterprise Server URL
    LABELS_TO_MEASURE    comma separated labels to time
    IGNORE_USERS         comma separated logins to leave out

  See .env.example for the full list.
`);
  process.exit(0);
}

void main();
