#!/usr/bin/env node
import { readFile, writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { ZodError } from 'zod';
import { env } from '../config/env.js';
import { connectDB, disconnectDB } from '../config/database.js';
import { createAmadeusProvider, createServices, serviceConfigFromEnv } from '../config/container.js';
import { meetingSearchSchema } from '../modules/meetings/meetings.validation.js';
import { CacheBackend } from '../utils/constants.js';
import { logger, routeLogsToStderr } from '../utils/logger.js';

const USAGE = 'Usage: find-meetings <search.json> [--out result.json]';

async function findMeetings(): Promise<void> {
  routeLogsToStderr();

  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: { out: { type: 'string', short: 'o' } },
  });
  const [searchFile] = positionals;
  if (!searchFile) {
    logger.error(USAGE);
    process.exit(2);
  }

  try {
    const request = meetingSearchSchema.parse(JSON.parse(await readFile(searchFile, 'utf-8')));

    if (env.CACHE_BACKEND === CacheBackend.MONGO && env.MONGODB_URI) {
      await connectDB(env.MONGODB_URI);
    }
    const { meetings } = createServices(serviceConfigFromEnv(env), createAmadeusProvider(env));
    const result = await meetings.findMeetingDestinations(request);
    const output = JSON.stringify(result, null, 2);

    if (values.out) {
      await writeFile(values.out, `${output}\n`, 'utf-8');
      logger.info(`✅ Wrote ${result.matches.length} match(es) to ${values.out}`);
    } else {
      process.stdout.write(`${output}\n`);
    }

    await disconnectDB();
    process.exit(0);
  } catch (error) {
    if (error instanceof ZodError) {
      logger.error(`Invalid search file ${searchFile}:`);
      for (const issue of error.issues) logger.error(`- ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    } else {
      logger.error('Meeting search failed:', error);
    }
    await disconnectDB();
    process.exit(1);
  }
}

void findMeetings();
