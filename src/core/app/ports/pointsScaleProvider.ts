import type { PointsScale } from '@core/domain';

export interface PointsScaleProvider {
  get(schemeId: string): PointsScale | null;
  list(): PointsScale[];
}
