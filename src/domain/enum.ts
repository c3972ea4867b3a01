/**
 * Canonical enumerations
 *
 * Remote APIs often return an enumeration as a number or an upper-case
 * string while configuration files use lower-case names. Both sides parse
 * into the same tagged member so the diff engine compares them directly.
 *
 * @example
 * ```ts
 * const LogLevel = defineEnum('LogLevel', {
 *   info: { value: 0 },
 *   debug: { value: 1 },
 *   trace: { value: 2, aliases: ['verbose'] }
 * })
 * LogLevel.parse('Verbose') === LogLevel.parse(2) // true
 * ```
 */

import { z } from 'zod'

export type EnumWireValue = string | number

export interface EnumMember<TName extends string = string> {
  readonly kind: 'enum'
  readonly type: string
  readonly name: TName
  readonly value: EnumWireValue
}

export interface EnumMemberDefinition {
  value: EnumWireValue
  aliases?: string[]
}

export interface EnumType<TName extends string> {
  readonly name: string
  readonly members: readonly EnumMember<TName>[]
  /** Member by canonical name */
  get(name: TName): EnumMember<TName>
  /** Member from a name, alias or wire value, or undefined */
  tryParse(input: unknown): EnumMember<TName> | undefined
  /** Member from a name, alias or wire value; throws when nothing matches */
  parse(input: unknown): EnumMember<TName>
  /** Zod schema accepting names, aliases and wire values */
  schema(): z.ZodType<EnumMember<TName>, z.ZodTypeDef, EnumWireValue>
}

export function isEnumMember(value: unknown): value is EnumMember {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'enum' &&
    'name' in value &&
    typeof value.name === 'string'
  )
}

export function defineEnum<TDefs extends Record<string, EnumMemberDefinition>>(
  typeName: string,
  definitions: TDefs
): EnumType<Extract<keyof TDefs, string>> {
  type TName = Extract<keyof TDefs, string>

  const members: EnumMember<TName>[] = []
  const byName = new Map<string, EnumMember<TName>>()
  const byValue = new Map<EnumWireValue, EnumMember<TName>>()

  for (const name of Object.keys(definitions)) {
    if (!isOwnName(name)) continue
    const definition = definitions[name]
    const member: EnumMember<TName> = {
      kind: 'enum',
      type: typeName,
      name,
      value: definition.value
    }
    members.push(member)
    byName.set(name.toLowerCase(), member)
    for (const alias of definition.aliases ?? []) {
      byName.set(alias.toLowerCase(), member)
    }
    byValue.set(definition.value, member)
  }

  function isOwnName(name: string): name is TName {
    return Object.prototype.hasOwnProperty.call(definitions, name)
  }

  function tryParse(input: unknown): EnumMember<TName> | undefined {
    if (isEnumMember(input)) {
      return input.type === typeName ? byName.get(input.name.toLowerCase()) : undefined
    }
    if (typeof input === 'number') {
      return byValue.get(input)
    }
    if (typeof input === 'string') {
      return byName.get(input.trim().toLowerCase()) ?? byValue.get(input)
    }
    return undefined
  }

  function describeAllowed(): string {
    return members.map(m => m.name).join(', ')
  }

  return {
    name: typeName,
    members,
    get(name: TName): EnumMember<TName> {
      const member = byName.get(name.toLowerCase())
      if (!member) {
        throw new Error(`${typeName} has no member "${name}"`)
      }
      return member
    },
    tryParse,
    parse(input: unknown): EnumMember<TName> {
      const member = tryParse(input)
      if (!member) {
        throw new Error(`Invalid ${typeName} value ${JSON.stringify(input)} (expected one of: ${describeAllowed()})`)
      }
      return member
    },
    schema() {
      return z.union([z.string(), z.number()]).transform((input, ctx) => {
        const member = tryParse(input)
        if (!member) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Invalid ${typeName} value ${JSON.stringify(input)} (expected one of: ${describeAllowed()})`
          })
          return z.NEVER
        }
        return member
      })
    }
  }
}
