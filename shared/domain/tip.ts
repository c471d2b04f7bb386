import { DEFAULT_LOCALE, type Tip, type TipInput, type TipType, type TipTypeInput } from '../types';
import { TipSchema, TipTypeSchema, validateDomain } from '../schemas/domainSchemas';

export function createTipType(input: TipTypeInput): TipType {
  return Object.freeze(
    validateDomain(TipTypeSchema, 'TipType', {
      id: input.id ?? 0,
      name: input.name,
      i8n: input.i8n ?? DEFAULT_LOCALE,
    })
  );
}

export function withTipTypeId(tipType: TipType, id: number): TipType {
  return createTipType({ ...tipType, id });
}

export function createTip(input: TipInput): Tip {
  return Object.freeze(
    validateDomain(TipSchema, 'Tip', {
      id: input.id ?? 0,
      tipTypeId: input.tipTypeId,
      title: input.title,
      content: input.content ?? '',
      fstop: input.fstop ?? '',
      shutterSpeed: input.shutterSpeed ?? '',
      iso: input.iso ?? '',
      i8n: input.i8n ?? DEFAULT_LOCALE,
    })
  );
}

export function withTipId(tip: Tip, id: number): Tip {
  return createTip({ ...tip, id });
}

export function updateTipContent(tip: Tip, title: string, content: string): Tip {
  return createTip({ ...tip, title, content });
}

export function updateTipCameraSettings(tip: Tip, fstop: string, shutterSpeed: string, iso: string): Tip {
  return createTip({ ...tip, fstop, shutterSpeed, iso });
}

export function setTipLocalization(tip: Tip, i8n: string): Tip {
  return createTip({ ...tip, i8n });
}
