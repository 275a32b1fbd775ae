import * as p from "@clack/prompts";
import { createLogger, loadConfigFromEnv, resolvePoolOptions } from "@pgwarden/core";
import { ConnectionManager } from "@pgwarden/pg";
import { Command } from "commander";
import pc from "picocolors";

function redactUrl(url: string): string {
	return url.replace(/\/\/([^:/@]+):([^@]+)@/, "//$1:***@");
}

export const statusCommand = new Command("status")
	.description("Check database connectivity and show pool settings")
	.option("--url <url>", "PostgreSQL connection URL (or set DATABASE_URL)")
	.action(async (options: { url?: string }) => {
		p.intro(pc.bgCyan(pc.black(" pgwarden status ")));

		// ---- Configuration ----
		p.log.step(pc.bold("Configuration"));

		const config = loadConfigFromEnv(process.env);
		if (options.url) {
			config.connection = { connectionString: options.url };
		}

		const { connection } = config;
		if (!connection.connectionString && !connection.host) {
			p.log.warning(
				`  Connection:    ${pc.yellow("not configured")} ${pc.dim("set DATABASE_URL, DB_HOST or use --url")}`,
			);
			p.outro(pc.dim("Set DATABASE_URL to see full status."));
			return;
		}

		const target = connection.connectionString
			? redactUrl(connection.connectionString)
			: `${connection.host}:${connection.port ?? 5432}/${connection.database ?? ""}`;
		p.log.info(`  Target:        ${pc.cyan(target)}`);

		const pool = resolvePoolOptions(config.pool);
		p.log.info(`  Pool size:     ${pool.min}..${pool.max} ${pc.dim(`(recycle after ${pool.maxUses} uses)`)}`);
		p.log.info(
			`  Timeouts:      ${pc.dim(`statement ${pool.statementTimeoutMs}ms, idle in tx ${pool.idleInTransactionTimeoutMs}ms`)}`,
		);
		p.log.info(`  Timezone:      ${pc.cyan(pool.timezone)}`);

		// ---- Database ----
		p.log.step(pc.bold("Database"));

		const manager = new ConnectionManager({
			connection,
			pool: { ...config.pool, min: 0, max: 1 },
			logger: createLogger({ level: config.logging?.level ?? "warn", format: config.logging?.format }),
		});

		try {
			manager.createPool();
			const healthy = await manager.healthCheck();
			if (!healthy) {
				p.log.error(`  Connection:    ${pc.red("failed")}`);
				p.outro(pc.red("Database unreachable."));
				process.exitCode = 1;
				return;
			}

			p.log.success(`  Connection:    ${pc.green("connected")}`);
			const stats = manager.stats();
			p.log.info(
				`  Clients:       ${stats.totalCount} total, ${stats.idleCount} idle, ${stats.activeCount} active, ${stats.waitingCount} waiting`,
			);
			p.outro(pc.green("Database reachable."));
		} finally {
			await manager.close();
		}
	});
