import { redirect } from "react-router";
import type { EntityType } from "~/db/types";
import { requireAccess, requireUser } from "~/lib/auth.server";
import { SITE_CONFIG } from "~/lib/config.server";
import { ENTITY_SCHEMAS } from "~/lib/entity-schemas";
import type { RouteHandler } from "~/lib/router.server";
import { entityListPath } from "~/lib/urls";
import { loadEntity } from "~/lib/view-handlers.server";

interface ErrorLink {
	code?: unknown;
	detail?: unknown;
	table?: unknown;
	constraint?: unknown;
	message?: unknown;
	cause?: unknown;
}

function isErrorLink(value: unknown): value is ErrorLink {
	return typeof value === "object" && value !== null;
}

function getErrorChain(error: unknown): ErrorLink[] {
	const chain: ErrorLink[] = [];
	const seen = new Set<unknown>();
	let current: unknown = error;

	while (isErrorLink(current) && !seen.has(current)) {
		seen.add(current);
		chain.push(current);
		current = current.cause;
	}

	return chain;
}

function nonEmpty(value: unknown): string | null {
	return typeof value === "string" && value.trim() ? value.trim() : null;
}

export interface SafeDeleteError {
	status: number;
	error: string;
	blockingDependencies: string[];
}

/**
 * Turn a driver error into a reply that names blocking rows but leaks nothing else
 */
export function toSafeDeleteError(
	entityType: EntityType,
	error: unknown,
): SafeDeleteError {
	const chain = getErrorChain(error);
	const code = chain
		.map((link) => link.code)
		.find((value): value is string => typeof value === "string");
	const dependencyDetails = Array.from(
		new Set(
			chain.flatMap((link) => {
				const details: string[] = [];
				const detail = nonEmpty(link.detail);
				if (detail) details.push(detail);
				const table = nonEmpty(link.table);
				if (table) details.push(`Referenced table: ${table}`);
				const constraint = nonEmpty(link.constraint);
				if (constraint) details.push(`Constraint: ${constraint}`);
				if (typeof link.message === "string") {
					const match = link.message.match(/referenced from table\s+"([^"]+)"/i);
					if (match?.[1]) {
						details.push(`Referenced table: ${match[1]}`);
					}
				}
				return details;
			}),
		),
	);
	const combinedMessage = chain
		.map((link) => (typeof link.message === "string" ? link.message : ""))
		.filter(Boolean)
		.join("\n")
		.toLowerCase();

	const isForeignKeyViolation =
		code === "23503" || combinedMessage.includes("foreign key");

	if (isForeignKeyViolation) {
		return {
			status: 400,
			error: `Cannot delete this ${entityType} because other records still reference it. Remove dependent links or records first.`,
			blockingDependencies: dependencyDetails,
		};
	}

	return {
		status: 500,
		error: "Delete failed due to an unexpected server error.",
		blockingDependencies: [],
	};
}

/**
 * Delete confirmation loader: same checks as the delete itself
 */
export function createGenericDeleteLoader(
	entityType: EntityType,
	idParam: string,
): RouteHandler {
	return async (args) => {
		const context = await requireUser(args.request);
		const entity = await loadEntity(context, entityType, args, idParam);
		requireAccess(context, "delete", entity.target);
		return Response.json({
			siteConfig: SITE_CONFIG,
			[entityType]: entity.record,
			confirm: true,
		});
	};
}

/**
 * Create a generic delete action for an entity type
 *
 * @example
 * ```ts
 * // In app/routes/motions/$motionId/delete/_index.ts
 * export const action = createGenericDeleteAction("motion", "motionId");
 * ```
 */
export function createGenericDeleteAction(
	entityType: EntityType,
	idParam: string,
): RouteHandler {
	const schema = ENTITY_SCHEMAS[entityType];

	return async (args) => {
		const context = await requireUser(args.request);
		const entity = await loadEntity(context, entityType, args, idParam);
		requireAccess(context, "delete", entity.target);

		const blocked = await schema.guardDelete?.(context.db, entity.record.id);
		if (blocked) {
			return blocked;
		}

		try {
			await schema.deleteItem(context.db, entity.record.id);
		} catch (error) {
			console.error(`[Entities] Delete ${entityType} failed:`, error);
			const safeError = toSafeDeleteError(entityType, error);
			return Response.json(
				{
					error: safeError.error,
					blockingDependencies: safeError.blockingDependencies,
				},
				{ status: safeError.status },
			);
		}

		console.log(
			`[Entities] Deleted ${entityType} ${entity.record.id} by ${context.user.id}`,
		);
		return redirect(entityListPath(entityType));
	};
}
