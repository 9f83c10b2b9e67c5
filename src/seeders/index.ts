/**
 * Database Seeders
 * Auto-seed sample loads and carriers (uses findOrCreate, safe to run multiple times)
 */

import { Load, Carrier } from '../models/index.js';
import logger from '../config/logger.js';
import { loadSeeds } from './data/loads.js';
import { carrierSeeds } from './data/carriers.js';

async function seedLoads(): Promise<void> {
  try {
    for (const load of loadSeeds) {
      await Load.findOrCreate({
        where: { referenceNumber: load.referenceNumber },
        defaults: load,
      });
    }
    logger.info(`Loads seeded successfully (${loadSeeds.length})`);
  } catch (error) {
    logger.error('Error seeding loads:', error);
    throw error;
  }
}

async function seedCarriers(): Promise<void> {
  try {
    for (const carrier of carrierSeeds) {
      await Carrier.findOrCreate({
        where: { mcNumber: carrier.mcNumber },
        defaults: carrier,
      });
    }
    logger.info(`Carriers seeded successfully (${carrierSeeds.length})`);
  } catch (error) {
    logger.error('Error seeding carriers:', error);
    throw error;
  }
}

export interface SeedOptions {
  only?: string[];
  skip?: string[];
}

const seeders: Record<string, () => Promise<void>> = {
  loads: seedLoads,
  carriers: seedCarriers,
};

export async function seedAll(options: SeedOptions = {}): Promise<void> {
  for (const [name, seed] of Object.entries(seeders)) {
    if (options.only && !options.only.includes(name)) continue;
    if (options.skip?.includes(name)) continue;
    await seed();
  }
  logger.info('Seeding complete');
}

export default seedAll;
