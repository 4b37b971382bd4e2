import { promises as fs } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { SyncError } from './shared/errors';
import { LOG_LEVELS } from './logger';

/** Longest rest a Node.js timer can wait (2^31 - 1 ms), in whole seconds. */
export const MAX_INTERVAL_SECONDS = 2147483;

const fieldName = z.string().min(1);

const checkpointSchema = z.discriminatedUnion('kind', [
	z.object({ kind: z.literal('file'), path: z.string().min(1).default('checkpoint.txt') }),
	z.object({ kind: z.literal('cassandra'), table: fieldName.default('sync_checkpoints'), name: fieldName.default('default') }),
]);

const columnStoreSchema = z.object({
	hosts: z.array(z.string().min(1)).min(1),
	localDataCenter: z.string().min(1).default('datacenter1'),
	keyspace: fieldName,
	table: fieldName,
	/** Reserved for change-log based sync; never read. */
	changesTable: fieldName.optional(),
	idType: z.enum(['uuid', 'text']).default('text'),
});

const searchIndexSchema = z.object({
	hosts: z.array(z.string().min(1)).min(1),
	indexName: fieldName,
	/** Mapping types were removed from Elasticsearch; kept so older configs still load. */
	documentType: z.string().min(1).optional(),
	pageSize: z.number().int().positive().default(500),
});

export const syncConfigSchema = z
	.object({
		idField: fieldName,
		versionField: fieldName,
		syncFields: z.array(fieldName),
		batchSize: z.number().int().positive(),
		intervalSeconds: z.number().int().max(MAX_INTERVAL_SECONDS),
		logLevel: z.enum(LOG_LEVELS).default('info'),
		checkpoint: checkpointSchema.default({ kind: 'file', path: 'checkpoint.txt' }),
		columnStore: columnStoreSchema,
		searchIndex: searchIndexSchema,
	})
	.superRefine((cfg, ctx) => {
		if (cfg.idField === cfg.versionField) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['versionField'], message: 'must differ from idField' });
		}
		const seen = new Set<string>();
		cfg.syncFields.forEach((f, i) => {
			if (f === cfg.idField || f === cfg.versionField) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['syncFields', i], message: `"${f}" is already the id or version field` });
			}
			if (seen.has(f)) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['syncFields', i], message: `duplicate field "${f}"` });
			seen.add(f);
		});
	});

export type SyncConfig = z.infer<typeof syncConfigSchema>;
export type CheckpointConfig = SyncConfig['checkpoint'];
export type ColumnStoreConfig = SyncConfig['columnStore'];
export type SearchIndexConfig = SyncConfig['searchIndex'];

/** Validate an already-parsed configuration document. */
export function parseConfig(input: unknown): SyncConfig {
	const res = syncConfigSchema.safeParse(input);
	if (!res.success) {
		const issues = res.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
		throw new SyncError('BAD_CONFIG', `Invalid configuration:\n  ${issues.join('\n  ')}`, { issues });
	}
	return res.data;
}

/** Read and validate a YAML configuration file. */
export async function loadConfig(path: string): Promise<SyncConfig> {
	let text: string;
	try {
		text = await fs.readFile(path, 'utf8');
	} catch (e) {
		throw new SyncError('BAD_CONFIG', `Cannot read config file ${path}`, { path }, { cause: e });
	}
	let doc: unknown;
	try {
		doc = parseYaml(text);
	} catch (e) {
		throw new SyncError('BAD_CONFIG', `Config file ${path} is not valid YAML`, { path }, { cause: e });
	}
	return parseConfig(doc);
}

/** Columns read and written on both sides: id, version, then the sync fields. */
export function replicatedFields(config: { idField: string; versionField: string; syncFields: readonly string[] }): string[] {
	return [config.idField, config.versionField, ...config.syncFields];
}
