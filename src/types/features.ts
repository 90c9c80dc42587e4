/**
 * Feature type definitions
 *
 * A feature describes the (possibly nested) type of one dataset column.
 * The `_type` discriminant matches the dataset `features` JSON format so a
 * parsed schema and its serialized form share the same tags.
 */

// =============================================================================
// Scalar Features
// =============================================================================

/** Plain value: number, string, boolean, timestamp, binary... */
export interface ValueFeature {
  _type: 'Value'
  /** Arrow-style dtype, e.g. 'int32', 'string', 'float64' */
  dtype: string
}

/** Integer label with optional class names */
export interface ClassLabelFeature {
  _type: 'ClassLabel'
  names?: string[] | undefined
  numClasses?: number | undefined
}

/** Translation with a fixed set of languages */
export interface TranslationFeature {
  _type: 'Translation'
  languages: string[]
}

/** Translation with a variable set of languages */
export interface TranslationVariableLanguagesFeature {
  _type: 'TranslationVariableLanguages'
  languages?: string[] | undefined
}

/** Fixed-shape multi-dimensional array */
export interface ArrayFeature {
  _type: 'Array2D' | 'Array3D' | 'Array4D' | 'Array5D'
  shape: number[]
  dtype: string
}

export type ScalarFeature =
  | ValueFeature
  | ClassLabelFeature
  | TranslationFeature
  | TranslationVariableLanguagesFeature
  | ArrayFeature

// =============================================================================
// Media Features
// =============================================================================

export interface ImageFeature {
  _type: 'Image'
}

export interface AudioFeature {
  _type: 'Audio'
  samplingRate?: number | undefined
}

export interface VideoFeature {
  _type: 'Video'
}

export interface PdfFeature {
  _type: 'Pdf'
}

export type MediaFeature = ImageFeature | AudioFeature | VideoFeature | PdfFeature

// =============================================================================
// Container Features
// =============================================================================

/** List of elements; `length` is -1 for variable length */
export interface ListFeature {
  _type: 'List'
  feature: FeatureType
  length: number
}

/** List stored with 64-bit offsets, always variable length */
export interface LargeListFeature {
  _type: 'LargeList'
  feature: FeatureType
}

/** Named fields */
export interface StructFeature {
  _type: 'Struct'
  fields: Record<string, FeatureType>
}

export type ContainerFeature = ListFeature | LargeListFeature | StructFeature

/** Any feature type */
export type FeatureType = ScalarFeature | MediaFeature | ContainerFeature

/** Tag of a feature type */
export type FeatureTypeName = FeatureType['_type']

/**
 * Column name to feature type, in schema order
 *
 * Object key order applies: integer-like column names ("1", "42") come
 * first, in ascending order, before all other names in insertion order.
 */
export type Features = Record<string, FeatureType>

/** Feature entry as exposed by the rows API */
export interface FeatureItem {
  feature_idx: number
  name: string
  type: unknown
}

// =============================================================================
// Constructors
// =============================================================================

export const Value = (dtype: string): ValueFeature => ({ _type: 'Value', dtype })

export const ClassLabel = (names?: string[]): ClassLabelFeature =>
  names ? { _type: 'ClassLabel', names, numClasses: names.length } : { _type: 'ClassLabel' }

export const Image = (): ImageFeature => ({ _type: 'Image' })

export const Audio = (samplingRate?: number): AudioFeature =>
  samplingRate === undefined ? { _type: 'Audio' } : { _type: 'Audio', samplingRate }

export const Video = (): VideoFeature => ({ _type: 'Video' })

export const Pdf = (): PdfFeature => ({ _type: 'Pdf' })

export const List = (feature: FeatureType, length = -1): ListFeature => ({
  _type: 'List',
  feature,
  length,
})

export const LargeList = (feature: FeatureType): LargeListFeature => ({ _type: 'LargeList', feature })

export const Struct = (fields: Record<string, FeatureType>): StructFeature => ({
  _type: 'Struct',
  fields,
})

/** Names of the media feature types */
export const MEDIA_FEATURE_TYPES: readonly FeatureTypeName[] = ['Image', 'Audio', 'Video', 'Pdf']
