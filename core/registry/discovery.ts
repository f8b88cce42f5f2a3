/**
 * Discovery - read-only queries over a ModuleRegistry.
 *
 * Matching: every filter given in the query must pass. `requiredTags` keeps a
 * module only if its tags are a superset of them. `optionalTags` never
 * excludes anything; it ranks.
 *
 * Ordering: modules with more distinct optional tags present come first;
 * ties (and queries without optional tags) are ordered by name, comparing
 * code units.
 */

import pLimit from "p-limit";
import type { Capability } from "./handle.ts";
import type { ModuleMetadata } from "./metadata.ts";
import type { ModuleRegistry } from "./module-registry.ts";

export interface DiscoveryQuery {
	/** Substring (case-sensitive) or regular expression tested against the name */
	pattern?: string | RegExp;
	/** Name prefix */
	prefix?: string;
	/** Exact module type */
	moduleType?: string;
	/** Tags every match must carry */
	requiredTags?: readonly string[];
	/** Tags that rank matches; never exclude */
	optionalTags?: readonly string[];
}

export interface DiscoveryMatch {
	name: string;
	metadata: ModuleMetadata;
	/** Number of optional tags the module carries */
	optionalMatches: number;
}

/**
 * Matches for a query with their metadata, in ranking order.
 */
export function describeMatches(
	registry: ModuleRegistry,
	query: DiscoveryQuery = {},
): DiscoveryMatch[] {
	const matches: DiscoveryMatch[] = [];
	const optionalTags = [...new Set(query.optionalTags)];

	for (const record of registry.records()) {
		const metadata = record.metadata;
		if (!matchesQuery(metadata, query)) {
			continue;
		}
		const tags = new Set(metadata.tags);
		const optionalMatches = optionalTags.filter((tag) => tags.has(tag)).length;
		matches.push({ name: record.name, metadata, optionalMatches });
	}

	return matches.sort(
		(a, b) => b.optionalMatches - a.optionalMatches || compareNames(a.name, b.name),
	);
}

/**
 * Names of the modules matching a query, in ranking order.
 */
export function discover(registry: ModuleRegistry, query: DiscoveryQuery = {}): string[] {
	return describeMatches(registry, query).map((match) => match.name);
}

/**
 * Check a single module's metadata against a query.
 */
export function matchesQuery(metadata: ModuleMetadata, query: DiscoveryQuery): boolean {
	if (query.moduleType !== undefined && metadata.moduleType !== query.moduleType) {
		return false;
	}
	if (query.prefix !== undefined && !metadata.name.startsWith(query.prefix)) {
		return false;
	}
	if (query.pattern !== undefined && !matchesPattern(metadata.name, query.pattern)) {
		return false;
	}
	if (query.requiredTags && query.requiredTags.length > 0) {
		const tags = new Set(metadata.tags);
		if (!query.requiredTags.every((tag) => tags.has(tag))) {
			return false;
		}
	}
	return true;
}

function matchesPattern(name: string, pattern: string | RegExp): boolean {
	if (typeof pattern === "string") {
		return name.includes(pattern);
	}
	// Fresh copy: a global or sticky RegExp keeps lastIndex between test() calls.
	return new RegExp(pattern.source, pattern.flags).test(name);
}

function compareNames(a: string, b: string): number {
	if (a < b) return -1;
	if (a > b) return 1;
	return 0;
}

export interface CreateMatchingOptions {
	/** Maximum factories running at once (default: 4) */
	concurrency?: number;
}

export interface CreatedModule<T> {
	name: string;
	instance: T;
}

/**
 * Instantiate every module matching a query as the given capability.
 * Results keep discovery order; the first failure rejects the whole call.
 */
export async function createMatching<T>(
	registry: ModuleRegistry,
	query: DiscoveryQuery,
	capability: Capability<T>,
	options: CreateMatchingOptions = {},
): Promise<CreatedModule<T>[]> {
	const limit = pLimit(options.concurrency ?? 4);
	const names = discover(registry, query);

	return Promise.all(
		names.map((name) =>
			limit(async () => ({ name, instance: await registry.createAs(name, capability) })),
		),
	);
}
