export type AttributeMap = Record<string, unknown>

export interface SerializeOptions {
  /** Keep only these attributes. Wins over `except`. */
  only?: readonly string[]
  /** Drop these attributes. */
  except?: readonly string[]
}

export interface JsonOptions extends SerializeOptions {
  /** Nest the attributes under the model's singular name. */
  root?: boolean
}

/**
 * Filter an attributes map by `only` / `except`, keeping its key order.
 */
export function serializableHash(attributes: AttributeMap, options: SerializeOptions = {}): AttributeMap {
  const { only, except } = options
  const result: AttributeMap = {}

  for (const [key, value] of Object.entries(attributes)) {
    if (only) {
      if (only.includes(key)) result[key] = value
    } else if (!except?.includes(key)) {
      result[key] = value
    }
  }
  return result
}

export function asJson(
  attributes: AttributeMap,
  rootKey: string,
  options: JsonOptions = {}
): AttributeMap {
  const hash = serializableHash(attributes, options)
  return options.root ? { [rootKey]: hash } : hash
}
