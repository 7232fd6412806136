/**
 * @fileoverview Response schemas for the chat web API
 */

import { z } from 'zod';

export const organizationSchema = z.object({
  uuid: z.string().min(1),
}).passthrough();

export const organizationListSchema = z.array(organizationSchema);

/** Only `title` matters; a missing or null title means "no answer" */
export const titleResponseSchema = z.object({
  title: z.string().nullish(),
}).passthrough();
