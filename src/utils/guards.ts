import { ArchiveProduct } from '../types';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isArchiveProduct(value: unknown): value is ArchiveProduct {
  return (
    isRecord(value) &&
    typeof value.supplierId === 'string' &&
    (value.downloadUrl === undefined || typeof value.downloadUrl === 'string')
  );
}
