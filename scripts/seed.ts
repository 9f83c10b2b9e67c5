import logger from '../src/config/logger.js';
import sequelize, { connectDatabase } from '../src/config/database.js';
import seedAll from '../src/seeders/index.js';

const parseList = (value: string | undefined): string[] | undefined => {
  if (!value) return undefined;
  return value.split(',').map((item) => item.trim()).filter(Boolean);
};

(async (): Promise<void> => {
  try {
    await connectDatabase({ seed: false });
    await seedAll({
      only: parseList(process.env.SEED_ONLY),
      skip: parseList(process.env.SEED_SKIP),
    });

    logger.info('Seeders executed successfully');
    await sequelize.close();
    process.exit(0);
  } catch (error) {
    logger.error('Seeding failed', error);
    await sequelize.close();
    process.exit(1);
  }
})();
