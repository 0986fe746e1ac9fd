import type {
  LocomotionSample,
  PlaceRecord,
  TimelineItemBase,
  V1TimelineItem,
  V2TimelineItem,
} from './types/index.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function toItemBase(raw: Record<string, unknown>): TimelineItemBase {
  return {
    id: optionalString(raw.id),
    startDate: optionalString(raw.startDate),
    endDate: optionalString(raw.endDate),
    isVisit: Boolean(raw.isVisit),
    placeId: optionalString(raw.placeId),
  };
}

export function toV1Item(value: unknown): V1TimelineItem | undefined {
  if (!isRecord(value)) return undefined;
  return toItemBase(value);
}

export function toV2Item(value: unknown): V2TimelineItem | undefined {
  if (!isRecord(value)) return undefined;

  return {
    ...toItemBase(value),
    base: isRecord(value.base) ? toItemBase(value.base) : undefined,
    visit: isRecord(value.visit) ? { placeId: optionalString(value.visit.placeId) } : undefined,
    place: isRecord(value.place) ? { id: optionalString(value.place.id) } : undefined,
  };
}

export function toSample(value: unknown): LocomotionSample | undefined {
  if (!isRecord(value)) return undefined;
  return { date: optionalString(value.date) };
}

export function toPlace(value: unknown): PlaceRecord | undefined {
  if (!isRecord(value)) return undefined;
  return { id: optionalString(value.id) };
}

type PlaceIdAccessor = (item: V2TimelineItem) => string | null | undefined;

/** Where a monthly item may keep its place reference, in lookup order. */
const PLACE_ID_ACCESSORS: PlaceIdAccessor[] = [
  (item) => item.placeId,
  (item) => item.base?.placeId,
  (item) => item.visit?.placeId,
  (item) => item.place?.id,
];

export function extractPlaceId(item: V2TimelineItem): string | undefined {
  for (const accessor of PLACE_ID_ACCESSORS) {
    const value = accessor(item);
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

export function itemSpanFields(item: V2TimelineItem): { startDate?: string; endDate?: string } {
  return {
    startDate: item.base?.startDate || item.startDate || undefined,
    endDate: item.base?.endDate || item.endDate || undefined,
  };
}
