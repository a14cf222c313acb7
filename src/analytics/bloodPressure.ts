import type { BloodPressureCategory } from '../types';

interface CategoryThreshold {
  category: BloodPressureCategory;
  diastolic: number;
  systolic: number;
}

// Checked top to bottom; the first threshold either component reaches wins
const CATEGORY_THRESHOLDS: readonly CategoryThreshold[] = [
  { category: 'crisis', diastolic: 120, systolic: 180 },
  { category: 'stage2', diastolic: 90, systolic: 140 },
  { category: 'stage1', diastolic: 80, systolic: 130 },
  { category: 'elevated', diastolic: 80, systolic: 120 },
];

export const BLOOD_PRESSURE_CATEGORY_LABELS = {
  crisis: 'Hypertensive Crisis',
  elevated: 'Elevated',
  normal: 'Normal',
  stage1: 'Stage 1 Hypertension',
  stage2: 'Stage 2 Hypertension',
} as const satisfies Record<BloodPressureCategory, string>;

/**
 * Fixed-threshold classification of (possibly averaged) values.
 * Values are rounded to whole mmHg before comparison.
 */
export function classifyBloodPressure(systolic: number, diastolic: number): BloodPressureCategory {
  const roundedSystolic = Math.round(systolic);
  const roundedDiastolic = Math.round(diastolic);

  const match = CATEGORY_THRESHOLDS.find(
    (threshold) =>
      roundedSystolic >= threshold.systolic || roundedDiastolic >= threshold.diastolic,
  );
  return match?.category ?? 'normal';
}
