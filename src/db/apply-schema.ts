// src/db/apply-schema.ts
// Applies src/db/sql/*.sql in file-name order. Every statement is idempotent.
import fs from 'fs';
import path from 'path';
import { sqlClient, closeDatabase } from '@/config/database';
import logger from '@/utils/logger';

// .sql files are not copied by tsc; read them from the source tree.
const SQL_DIR = path.resolve(process.cwd(), 'src/db/sql');

const applySchema = async (): Promise<void> => {
    const files = fs.readdirSync(SQL_DIR).filter((file) => file.endsWith('.sql')).sort();
    for (const file of files) {
        logger.info(`Applying ${file}`);
        await sqlClient.file(path.join(SQL_DIR, file)).simple();
    }
    logger.info(`Schema applied (${files.length} file(s)).`);
};

const main = async (): Promise<void> => {
    try {
        await applySchema();
    } catch (error) {
        logger.error('Schema application failed:', error);
        process.exitCode = 1;
    } finally {
        await closeDatabase();
    }
};

void main();
