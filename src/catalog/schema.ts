import { z } from 'zod'

export type CatalogVersion = 1

export type PathKind = 'file' | 'dir' | 'symlink'

export type ProbeSpec =
  | { type: 'command'; command: string; versionArgs?: string[]; expect?: string }
  | { type: 'package'; packages: string[]; state?: 'installed' | 'absent' }
  | { type: 'path'; path: string; kind?: PathKind; linkTo?: string }
  | { type: 'dir-empty'; paths: string[] }
  | { type: 'marker'; file: string; marker: string; commentPrefix?: string }
  | { type: 'service'; service: string }
  | { type: 'user'; user: string }
  | { type: 'exec'; command: string; args?: string[]; exitCode?: number; stdoutIncludes?: string; stdoutEquals?: string }
  | { type: 'nix-profile'; name: string }
  | { type: 'disk-space'; path?: string; minMb: number }
  | { type: 'internet' }
  | { type: 'all'; probes: ProbeSpec[] }
  | { type: 'not'; probe: ProbeSpec }

export type ActionSpec =
  | { type: 'package-install'; packages: string[]; update?: boolean }
  | { type: 'package-remove'; packages: string[] }
  | { type: 'exec'; command: string; args?: string[]; input?: string }
  | { type: 'write-file'; path: string; content?: string; source?: string; mode?: string }
  | { type: 'remove-path'; paths: string[] }
  | { type: 'clean-dir'; paths: string[] }
  | { type: 'insert-block'; file: string; marker: string; content?: string; source?: string; commentPrefix?: string }
  | { type: 'remove-block'; file: string; marker: string; commentPrefix?: string }
  | { type: 'symlink'; source: string; target: string }
  | { type: 'service-enable'; service: string; runlevel?: string }
  | { type: 'service-disable'; service: string; runlevel?: string }
  | { type: 'nix-profile-install'; ref: string }
  | { type: 'nix-profile-remove'; name: string }
  | { type: 'user-remove'; user: string }
  | { type: 'sequence'; actions: ActionSpec[] }

const name = z.string().min(1)
const stringList = z.array(name).min(1)
const mode = z.string().regex(/^[0-7]{3,4}$/, 'mode must be an octal string such as "644"')

export const ProbeSpecSchema: z.ZodType<ProbeSpec> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('command'), command: name, versionArgs: z.array(z.string()).optional(), expect: z.string().optional() }),
    z.object({ type: z.literal('package'), packages: stringList, state: z.enum(['installed', 'absent']).optional() }),
    z.object({ type: z.literal('path'), path: name, kind: z.enum(['file', 'dir', 'symlink']).optional(), linkTo: name.optional() }),
    z.object({ type: z.literal('dir-empty'), paths: stringList }),
    z.object({ type: z.literal('marker'), file: name, marker: name, commentPrefix: name.optional() }),
    z.object({ type: z.literal('service'), service: name }),
    z.object({ type: z.literal('user'), user: name }),
    z.object({
      type: z.literal('exec'),
      command: name,
      args: z.array(z.string()).optional(),
      exitCode: z.number().int().optional(),
      stdoutIncludes: z.string().optional(),
      stdoutEquals: z.string().optional(),
    }),
    z.object({ type: z.literal('nix-profile'), name }),
    z.object({ type: z.literal('disk-space'), path: name.optional(), minMb: z.number().positive() }),
    z.object({ type: z.literal('internet') }),
    z.object({ type: z.literal('all'), probes: z.array(ProbeSpecSchema).min(1) }),
    z.object({ type: z.literal('not'), probe: ProbeSpecSchema }),
  ]),
)

export const ActionSpecSchema: z.ZodType<ActionSpec> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('package-install'), packages: stringList, update: z.boolean().optional() }),
    z.object({ type: z.literal('package-remove'), packages: stringList }),
    z.object({ type: z.literal('exec'), command: name, args: z.array(z.string()).optional(), input: z.string().optional() }),
    z.object({ type: z.literal('write-file'), path: name, content: z.string().optional(), source: name.optional(), mode: mode.optional() }),
    z.object({ type: z.literal('remove-path'), paths: stringList }),
    z.object({ type: z.literal('clean-dir'), paths: stringList }),
    z.object({
      type: z.literal('insert-block'),
      file: name,
      marker: name,
      content: z.string().optional(),
      source: name.optional(),
      commentPrefix: name.optional(),
    }),
    z.object({ type: z.literal('remove-block'), file: name, marker: name, commentPrefix: name.optional() }),
    z.object({ type: z.literal('symlink'), source: name, target: name }),
    z.object({ type: z.literal('service-enable'), service: name, runlevel: name.optional() }),
    z.object({ type: z.literal('service-disable'), service: name, runlevel: name.optional() }),
    z.object({ type: z.literal('nix-profile-install'), ref: name }),
    z.object({ type: z.literal('nix-profile-remove'), name }),
    z.object({ type: z.literal('user-remove'), user: name }),
    z.object({ type: z.literal('sequence'), actions: z.array(ActionSpecSchema).min(1) }),
  ]),
)

export const CatalogItemSchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9._-]*$/, 'item names are lowercase kebab-case'),
  description: z.string().optional(),
  critical: z.boolean().default(false),
  timeoutSeconds: z.number().positive().optional(),
  hint: z.string().optional(),
  probe: ProbeSpecSchema,
  action: ActionSpecSchema.optional(),
  /**
   * Action that undoes this item during teardown.
   */
  revert: ActionSpecSchema.optional(),
  /**
   * Why this item deliberately has no teardown counterpart.
   */
  keepOnTeardown: z.string().optional(),
})

export type CatalogItem = z.infer<typeof CatalogItemSchema>

export const CatalogSchema = z
  .object({
    version: z.literal(1),
    vars: z.record(z.string(), z.string()).default({}),
    items: z.array(CatalogItemSchema),
  })
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>()
    catalog.items.forEach((item, i) => {
      if (seen.has(item.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['items', i, 'name'], message: `Duplicate item name: ${item.name}` })
      }
      seen.add(item.name)
    })
  })

export type Catalog = z.infer<typeof CatalogSchema>
