import { temporal } from '@temporalio/proto'

import type {
  ObservedSearchAttributeType,
  ResolvedSearchAttribute,
  SearchAttributeObservation,
  SearchAttributeType,
} from '../types'

const { IndexedValueType } = temporal.api.enums.v1

const INDEXED_VALUE_TYPES: Record<SearchAttributeType, temporal.api.enums.v1.IndexedValueType> = {
  Text: IndexedValueType.INDEXED_VALUE_TYPE_TEXT,
  Keyword: IndexedValueType.INDEXED_VALUE_TYPE_KEYWORD,
  Int: IndexedValueType.INDEXED_VALUE_TYPE_INT,
  Double: IndexedValueType.INDEXED_VALUE_TYPE_DOUBLE,
  Bool: IndexedValueType.INDEXED_VALUE_TYPE_BOOL,
  Datetime: IndexedValueType.INDEXED_VALUE_TYPE_DATETIME,
  KeywordList: IndexedValueType.INDEXED_VALUE_TYPE_KEYWORD_LIST,
}

const isSearchAttributeType = (value: string): value is SearchAttributeType => value in INDEXED_VALUE_TYPES

export const toIndexedValueType = (type: SearchAttributeType) => INDEXED_VALUE_TYPES[type]

export const toSearchAttributeTypeName = (
  value: temporal.api.enums.v1.IndexedValueType | null | undefined,
): ObservedSearchAttributeType => {
  for (const [name, candidate] of Object.entries(INDEXED_VALUE_TYPES)) {
    if (candidate === value && isSearchAttributeType(name)) {
      return name
    }
  }
  return 'Unspecified'
}

export const buildAddSearchAttributesRequest = (
  attribute: ResolvedSearchAttribute,
): temporal.api.operatorservice.v1.IAddSearchAttributesRequest => ({
  namespace: attribute.temporalNamespaceName,
  searchAttributes: { [attribute.name]: toIndexedValueType(attribute.type) },
})

export const toSearchAttributeObservations = (
  namespace: string,
  response: temporal.api.operatorservice.v1.IListSearchAttributesResponse,
): SearchAttributeObservation[] =>
  Object.entries(response.customAttributes ?? {})
    .map(([name, value]) => ({ name, type: toSearchAttributeTypeName(value), temporalNamespaceName: namespace }))
    .sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0))
