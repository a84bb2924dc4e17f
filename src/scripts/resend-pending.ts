import { loadConfig } from '../config.js';
import { initDatabase, openDatabase } from '../database.js';
import { logger } from '../logger.js';
import { NetworkCoverageFactory } from '../network-coverage-factory.js';

const config = loadConfig();
const db = openDatabase(config.databasePath);

async function main() {
    initDatabase(db);
    const factory = new NetworkCoverageFactory({ config, db });

    // 1. Nothing is measuring here, so unfinished sessions are fair game
    const report = await factory.resender.resendPersistentSessions(true);

    // 2. Summarize
    logger.info({
        purged: report.purged,
        sent: report.sent.length,
        failed: report.failed.length
    }, 'Pending coverage results processed');

    return report.failed.length === 0 ? 0 : 1;
}

main()
    .then((code) => {
        db.close();
        process.exit(code);
    })
    .catch((err: unknown) => {
        logger.error({ err }, 'Resend failed');
        db.close();
        process.exit(1);
    });
