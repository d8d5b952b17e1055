import * as readline from 'node:readline/promises';
import { config as loadEnv } from 'dotenv';
import {
  AmadeusFlightClient,
  ConfigurationError,
  FlightSearchService,
  GroqQueryClient,
  MemoryCacheStore,
  PatternQueryParser,
  QueryUnderstandingService,
  createResolutionPipeline,
  loadAirportTable,
  loadConfig,
  silentLogger
} from '@flightfinder/shared';
import { runFlightAgent } from './cli';

async function main(): Promise<number> {
  loadEnv();
  const config = loadConfig();
  const verbose = process.env.FLIGHT_AGENT_VERBOSE === '1';
  const logger = verbose ? console : silentLogger;

  const table = await loadAirportTable(config.airportsCsvPath);
  const pipeline = createResolutionPipeline(table, config, { cache: new MemoryCacheStore(), logger });

  const understanding = new QueryUnderstandingService(
    new PatternQueryParser(),
    config.groq.apiKey ? new GroqQueryClient({ ...config.groq }) : undefined,
    logger
  );
  const offers = new AmadeusFlightClient({ ...config.amadeus, retry: { logger } });
  const search = new FlightSearchService(understanding, pipeline, offers, { logger });

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await runFlightAgent(process.argv.slice(2), search, {
      write: (text) => process.stdout.write(text),
      prompt: (question) => rl.question(question)
    });
  } finally {
    rl.close();
    pipeline.shutdown();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    if (error instanceof ConfigurationError) {
      console.error(`❌ Invalid configuration (${error.setting}): ${error.message}`);
    } else {
      console.error('❌ Flight agent failed:', error);
    }
    process.exitCode = 1;
  });
