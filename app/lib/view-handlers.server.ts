import { redirect } from "react-router";
import type { EntityType } from "~/db/types";
import { can } from "./access/engine";
import { type RequestContext, requireAccess, requireUser } from "./auth.server";
import { SITE_CONFIG } from "./config.server";
import {
	ENTITY_SCHEMAS,
	type LoadedEntity,
	formFields,
	searchFields,
} from "./entity-schemas";
import { badRequest, notFound } from "./http.server";
import type { RouteArgs, RouteHandler } from "./router.server";
import { entityPath } from "./urls";

/**
 * Load the entity named by a route param, or end the request.
 * A missing entity answers 404 before any access check runs.
 */
export async function loadEntity(
	context: RequestContext,
	entityType: EntityType,
	{ params }: RouteArgs,
	idParam: string,
): Promise<LoadedEntity> {
	const entityId = params[idParam];
	if (!entityId) {
		throw badRequest(`${entityType} ID required`);
	}
	const entity = await ENTITY_SCHEMAS[entityType].fetchById(context.db, entityId);
	if (!entity) {
		throw notFound();
	}
	return entity;
}

/**
 * List loader: the records of one type the user may view
 */
export function createListLoader(entityType: EntityType): RouteHandler {
	const schema = ENTITY_SCHEMAS[entityType];
	return async ({ request }) => {
		const context = await requireUser(request);
		requireAccess(context, "list", entityType);

		const items = (await schema.list(context.db))
			.filter((entity) =>
				can(context.user, context.memberships, "view", entity.target),
			)
			.map((entity) => entity.record);

		return Response.json({ siteConfig: SITE_CONFIG, items });
	};
}

export function createViewLoader(
	entityType: EntityType,
	idParam: string,
): RouteHandler {
	const schema = ENTITY_SCHEMAS[entityType];
	return async (args) => {
		const context = await requireUser(args.request);
		const entity = await loadEntity(context, entityType, args, idParam);
		requireAccess(context, "view", entity.target);

		const extraData = schema.extend
			? await schema.extend(context.db, entity.record.id, context.user)
			: {};

		return Response.json({
			siteConfig: SITE_CONFIG,
			[entityType]: entity.record,
			...extraData,
		});
	};
}

/**
 * Create form loader and action. The parent the new record would belong to
 * comes from the query string on GET and from the form on POST.
 */
export function createNewHandlers(entityType: EntityType): {
	loader: RouteHandler;
	action: RouteHandler;
} {
	const schema = ENTITY_SCHEMAS[entityType];
	return {
		loader: async ({ request }) => {
			const context = await requireUser(request);
			const defaults = searchFields(new URL(request.url));
			requireAccess(context, "create", schema.createTarget(defaults));
			return Response.json({
				siteConfig: SITE_CONFIG,
				entityType,
				defaults,
				...schema.formOptions?.(),
			});
		},
		action: async ({ request }) => {
			const context = await requireUser(request);
			const fields = formFields(await request.formData());
			requireAccess(context, "create", schema.createTarget(fields));

			const created = await schema.createItem(context.db, fields, context.user);
			console.log(
				`[Entities] Created ${entityType} ${created.record.id} by ${context.user.id}`,
			);
			return redirect(entityPath(entityType, created.record.id));
		},
	};
}

/**
 * Edit form loader and action. Both check edit on the stored record, so a
 * submitted form cannot move the record out of the user's reach.
 */
export function createEditHandlers(
	entityType: EntityType,
	idParam: string,
): { loader: RouteHandler; action: RouteHandler } {
	const schema = ENTITY_SCHEMAS[entityType];
	return {
		loader: async (args) => {
			const context = await requireUser(args.request);
			const entity = await loadEntity(context, entityType, args, idParam);
			requireAccess(context, "edit", entity.target);
			return Response.json({
				siteConfig: SITE_CONFIG,
				[entityType]: entity.record,
				...schema.formOptions?.(),
			});
		},
		action: async (args) => {
			const context = await requireUser(args.request);
			const entity = await loadEntity(context, entityType, args, idParam);
			requireAccess(context, "edit", entity.target);

			const fields = formFields(await args.request.formData());
			const updated = await schema.updateItem(
				context.db,
				entity.record.id,
				fields,
			);
			if (!updated) {
				throw notFound();
			}
			return redirect(entityPath(entityType, updated.record.id));
		},
	};
}
