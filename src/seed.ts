import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { RolesSeeder } from './accounts/roles.seeder';
import { CatalogSeeder } from './products/catalog.seeder';
import { FormsSeeder } from './forms/forms.seeder';

/** Roles, catalog, then form templates (which link to catalog products). */
const logger = new Logger('Seed');

async function seed() {
  const app = await NestFactory.createApplicationContext(AppModule);
  try {
    const roles = await app.get(RolesSeeder).seed();
    const catalogRows = await app.get(CatalogSeeder).seedFromFile();
    const templates = await app.get(FormsSeeder).seedFromFile();
    logger.log(
      `Seeded ${roles.created.length} new roles, ${catalogRows} catalog rows, ${templates} form templates`,
    );
  } finally {
    await app.close();
  }
}

seed().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
