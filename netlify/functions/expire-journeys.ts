/**
 * Scheduled function: applies lapsed journey deadlines every five minutes.
 */

import type { Config } from '@netlify/functions';
import { getProductionContainer } from '../../src/container.production.js';

export default async () => {
  const container = getProductionContainer();
  const stats = await container.sweepService.sweep(new Date());
  await container.logProvider.flush();
  return new Response(JSON.stringify(stats), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
};

export const config: Config = {
  schedule: '*/5 * * * *',
};
