/**
 * Zod schemas for the resource document envelope.
 */

import { z } from "zod";

export const MetaSchema = z.record(z.unknown());

export const LinkObjectSchema = z
  .object({
    href: z.string(),
    meta: MetaSchema.optional(),
  })
  .passthrough();

export const LinkSchema = z.union([z.string(), LinkObjectSchema, z.null()]);

export const LinksSchema = z.record(LinkSchema);

const IdSchema = z.union([z.string(), z.number()]);

export const ResourceIdentifierSchema = z
  .object({
    type: z.string().min(1),
    id: IdSchema,
    meta: MetaSchema.optional(),
  })
  .passthrough();

export const RelationshipObjectSchema = z
  .object({
    data: z
      .union([ResourceIdentifierSchema, z.array(ResourceIdentifierSchema), z.null()])
      .optional(),
    links: LinksSchema.optional(),
    meta: MetaSchema.optional(),
  })
  .refine((rel) => rel.data !== undefined || rel.links !== undefined || rel.meta !== undefined, {
    message: "A relationship object must contain at least one of data, links or meta",
  });

export const ResourceObjectSchema = z.object({
  type: z.string().min(1),
  id: IdSchema,
  attributes: z.record(z.unknown()).optional(),
  relationships: z.record(RelationshipObjectSchema).optional(),
  links: LinksSchema.optional(),
  meta: MetaSchema.optional(),
});

export const ErrorObjectSchema = z
  .object({
    id: z.string().optional(),
    status: z.string().optional(),
    code: z.string().optional(),
    title: z.string().optional(),
    detail: z.string().optional(),
    source: z.record(z.unknown()).optional(),
    meta: MetaSchema.optional(),
  })
  .passthrough();

export const DocumentSchema = z
  .object({
    data: z.union([ResourceObjectSchema, z.array(ResourceObjectSchema), z.null()]).optional(),
    included: z.array(ResourceObjectSchema).optional(),
    links: LinksSchema.optional(),
    meta: MetaSchema.optional(),
    errors: z.array(ErrorObjectSchema).optional(),
    jsonapi: z.record(z.unknown()).optional(),
  })
  .refine((doc) => !(doc.data !== undefined && doc.errors !== undefined), {
    message: "The members data and errors must not coexist in the same document",
  });

export type WireLink = z.infer<typeof LinkSchema>;
export type WireLinks = z.infer<typeof LinksSchema>;
export type WireResourceIdentifier = z.infer<typeof ResourceIdentifierSchema>;
export type WireRelationship = z.infer<typeof RelationshipObjectSchema>;
export type WireResource = z.infer<typeof ResourceObjectSchema>;
export type WireErrorObject = z.infer<typeof ErrorObjectSchema>;
export type WireDocument = z.infer<typeof DocumentSchema>;
