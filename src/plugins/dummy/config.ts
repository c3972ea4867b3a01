/**
 * Dummy plugin configuration
 *
 * Single instance:
 *
 * ```yaml
 * dummy:
 *   hostname: localhost
 *   port: 5000
 *   settings:
 *     instance_name: "Dummy ({instance})"
 *     log_level: debug
 * ```
 *
 * Several instances, one importing tags from another:
 *
 * ```yaml
 * dummy:
 *   api_key: ${DUMMY_API_KEY}
 *   instances:
 *     dummy-main:
 *       tags:
 *         definitions: [anime, kids]
 *     dummy-mirror:
 *       import_from:
 *         instance: dummy-main
 *         tags: [anime]
 * ```
 */

import { z } from 'zod'
import { defineEnum } from '../../domain/enum.js'
import { instanceConfigSchema } from '../types.js'

export const DUMMY_PLUGIN_NAME = 'dummy'
export const DUMMY_DEFAULT_HOSTNAME = 'dummy'
export const DUMMY_DEFAULT_PORT = 5000

export const DummyLogLevel = defineEnum('DummyLogLevel', {
  error: { value: 'ERROR' },
  warn: { value: 'WARN', aliases: ['warning'] },
  info: { value: 'INFO' },
  debug: { value: 'DEBUG' },
  trace: { value: 'TRACE', aliases: ['verbose'] }
})

export const dummySettingsSchema = z.object({
  /** `{instance}` is replaced with the instance name */
  instance_name: z.string().min(1).optional(),
  log_level: DummyLogLevel.schema().optional(),
  update_automatically: z.boolean().optional()
}).strict()

export const dummyTagsSchema = z.object({
  definitions: z.array(z.string().min(1)).optional(),
  /** Delete remote tags not listed in `definitions` */
  delete_unmanaged: z.boolean().default(false)
}).strict()

export const dummyImportSchema = z.object({
  /** Name of another dummy instance */
  instance: z.string().min(1),
  /** Tag labels on the source instance to import from */
  tags: z.array(z.string().min(1)).default([])
}).strict()

/**
 * Import source resolved against the live source instance
 */
export const dummyImportSourceSchema = z.object({
  url: z.string().min(1),
  tag_ids: z.array(z.number().int())
}).strict()

export const dummyConfigSchema = instanceConfigSchema.extend({
  hostname: z.string().min(1).default(DUMMY_DEFAULT_HOSTNAME),
  port: z.number().int().min(1).max(65535).default(DUMMY_DEFAULT_PORT),
  /** Fetched from the instance when unset (authentication must be disabled) */
  api_key: z.string().min(1).optional(),
  settings: dummySettingsSchema.default({}),
  tags: dummyTagsSchema.default({}),
  import_from: dummyImportSchema.optional(),
  import_source: dummyImportSourceSchema.optional()
}).strict()

export type DummyConfig = z.infer<typeof dummyConfigSchema>
