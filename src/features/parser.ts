/**
 * Feature schema codec
 *
 * Parses and serializes the dataset `features` JSON format:
 * - `{ "_type": "Value", "dtype": "int32" }` style tagged nodes
 * - plain objects as structs, `[feature]` as variable-length lists
 * - legacy `Sequence` nodes, read as lists (a sequence of a struct is a
 *   struct of lists)
 *
 * @module features/parser
 */

import type {
  ArrayFeature,
  FeatureItem,
  FeatureType,
  Features,
  ListFeature,
} from '../types/features'
import { TypeMismatchError, UnknownFeatureTypeError } from '../errors'
import { describeValue, isPlainObject } from '../utils/describe'

// =============================================================================
// Parsing
// =============================================================================

const ARRAY_TYPES: readonly ArrayFeature['_type'][] = ['Array2D', 'Array3D', 'Array4D', 'Array5D']

function malformed(node: unknown, expected: string): TypeMismatchError {
  return new TypeMismatchError(`Malformed ${expected} feature: ${describeValue(node)}`, { expected })
}

function stringArray(value: unknown): string[] | undefined {
  return Array.isArray(value) && value.every(item => typeof item === 'string') ? value : undefined
}

function numberArray(value: unknown): number[] | undefined {
  return Array.isArray(value) && value.every(item => typeof item === 'number') ? value : undefined
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined
}

function parseLength(node: Record<string, unknown>): number {
  const length = node.length ?? -1
  if (typeof length !== 'number' || !Number.isInteger(length) || length < -1) {
    throw malformed(node, String(node._type))
  }
  return length
}

function parseStruct(node: Record<string, unknown>): Record<string, FeatureType> {
  const fields: Record<string, FeatureType> = {}
  for (const [name, child] of Object.entries(node)) {
    fields[name] = parseFeature(child)
  }
  return fields
}

/**
 * Legacy `Sequence`: a list, except that a sequence of a struct becomes a
 * struct whose fields are lists
 */
function parseSequence(node: Record<string, unknown>): FeatureType {
  const length = parseLength(node)
  const inner = node.feature
  if (isPlainObject(inner) && !('_type' in inner)) {
    const fields: Record<string, FeatureType> = {}
    for (const [name, child] of Object.entries(inner)) {
      fields[name] = { _type: 'List', feature: parseFeature(child), length }
    }
    return { _type: 'Struct', fields }
  }
  return { _type: 'List', feature: parseFeature(inner), length }
}

/**
 * Parse one node of a features JSON dictionary
 *
 * @throws UnknownFeatureTypeError for an unknown `_type`
 * @throws TypeMismatchError for a malformed node
 */
export function parseFeature(node: unknown): FeatureType {
  if (Array.isArray(node)) {
    if (node.length !== 1) {
      throw malformed(node, 'List')
    }
    return { _type: 'List', feature: parseFeature(node[0]), length: -1 }
  }
  if (!isPlainObject(node)) {
    throw malformed(node, 'feature')
  }
  if (!('_type' in node)) {
    return { _type: 'Struct', fields: parseStruct(node) }
  }

  const type = node._type
  switch (type) {
    case 'Value': {
      if (typeof node.dtype !== 'string') {
        throw malformed(node, 'Value')
      }
      return { _type: 'Value', dtype: node.dtype }
    }
    case 'ClassLabel': {
      const names = stringArray(node.names)
      const numClasses = optionalNumber(node.num_classes) ?? names?.length
      return { _type: 'ClassLabel', names, numClasses }
    }
    case 'Translation': {
      const languages = stringArray(node.languages)
      if (!languages) {
        throw malformed(node, 'Translation')
      }
      return { _type: 'Translation', languages }
    }
    case 'TranslationVariableLanguages':
      return { _type: 'TranslationVariableLanguages', languages: stringArray(node.languages) }
    case 'Array2D':
    case 'Array3D':
    case 'Array4D':
    case 'Array5D': {
      const arrayType = ARRAY_TYPES.find(name => name === type)
      const shape = numberArray(node.shape)
      if (!arrayType || !shape || typeof node.dtype !== 'string') {
        throw malformed(node, 'Array')
      }
      return { _type: arrayType, shape, dtype: node.dtype }
    }
    case 'Image':
      return { _type: 'Image' }
    case 'Audio':
      return { _type: 'Audio', samplingRate: optionalNumber(node.sampling_rate) }
    case 'Video':
      return { _type: 'Video' }
    case 'Pdf':
      return { _type: 'Pdf' }
    case 'List':
      return { _type: 'List', feature: parseFeature(node.feature), length: parseLength(node) }
    case 'LargeList':
      return { _type: 'LargeList', feature: parseFeature(node.feature) }
    case 'Sequence':
      return parseSequence(node)
    default:
      throw new UnknownFeatureTypeError(typeof type === 'string' ? type : describeValue(type))
  }
}

/**
 * Parse a features JSON dictionary (column name to feature node)
 */
export function parseFeatures(json: unknown): Features {
  if (!isPlainObject(json)) {
    throw malformed(json, 'Features')
  }
  return parseStruct(json)
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * Serialize a feature back to the features JSON format
 */
export function featureToDict(feature: FeatureType): unknown {
  switch (feature._type) {
    case 'Value':
      return { dtype: feature.dtype, _type: 'Value' }
    case 'ClassLabel':
      return feature.names
        ? { names: feature.names, _type: 'ClassLabel' }
        : { num_classes: feature.numClasses, _type: 'ClassLabel' }
    case 'Translation':
      return { languages: feature.languages, _type: 'Translation' }
    case 'TranslationVariableLanguages':
      return {
        languages: feature.languages ?? null,
        num_languages: feature.languages?.length ?? null,
        _type: 'TranslationVariableLanguages',
      }
    case 'Array2D':
    case 'Array3D':
    case 'Array4D':
    case 'Array5D':
      return { shape: feature.shape, dtype: feature.dtype, _type: feature._type }
    case 'Image':
    case 'Video':
    case 'Pdf':
      return { _type: feature._type }
    case 'Audio':
      return feature.samplingRate === undefined
        ? { _type: 'Audio' }
        : { sampling_rate: feature.samplingRate, _type: 'Audio' }
    case 'List':
      return listToDict(feature)
    case 'LargeList':
      return { feature: featureToDict(feature.feature), _type: 'LargeList' }
    case 'Struct': {
      const fields: Record<string, unknown> = {}
      for (const [name, field] of Object.entries(feature.fields)) {
        fields[name] = featureToDict(field)
      }
      return fields
    }
  }
}

function listToDict(feature: ListFeature): unknown {
  const inner = featureToDict(feature.feature)
  return feature.length >= 0
    ? { feature: inner, length: feature.length, _type: 'List' }
    : { feature: inner, _type: 'List' }
}

/**
 * Serialize a schema to the features JSON format
 */
export function featuresToDict(features: Features): Record<string, unknown> {
  const dict: Record<string, unknown> = {}
  for (const [name, feature] of Object.entries(features)) {
    dict[name] = featureToDict(feature)
  }
  return dict
}

/**
 * Ordered list of the schema's columns with their serialized types
 *
 * JSON objects do not keep key order everywhere, so APIs expose the schema
 * as a list. Its order is the `Features` key order, which puts integer-like
 * column names first.
 */
export function toFeaturesList(features: Features): FeatureItem[] {
  return Object.entries(features).map(([name, feature], index) => ({
    feature_idx: index,
    name,
    type: featureToDict(feature),
  }))
}
