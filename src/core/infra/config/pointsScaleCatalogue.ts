import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import type { PointsScaleProvider } from '@core/app';
import type { PointsScale } from '@core/domain';

const positionKey = /^[1-9]\d*$/;

const scaleSchema = z
  .object({
    schemeId: z.string().trim().min(1, 'schemeId is required.'),
    fieldSize: z.number().int().positive('fieldSize must be positive.'),
    points: z.record(
      z.string().regex(positionKey, 'Positions must be positive integers.'),
      z.number().int().nonnegative('Points must be zero or more.'),
    ),
  })
  .superRefine((scale, ctx) => {
    for (const key of Object.keys(scale.points)) {
      if (Number(key) > scale.fieldSize) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['points', key],
          message: `Position ${key} is outside the field size ${scale.fieldSize}.`,
        });
      }
    }
  });

const catalogueSchema = z
  .object({ scales: z.array(scaleSchema).min(1, 'At least one points scale is required.') })
  .superRefine((catalogue, ctx) => {
    const seen = new Set<string>();
    catalogue.scales.forEach((scale, index) => {
      if (seen.has(scale.schemeId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['scales', index, 'schemeId'],
          message: `Duplicate points scheme "${scale.schemeId}".`,
        });
      }
      seen.add(scale.schemeId);
    });
  });

export class PointsScaleCatalogueError extends Error {
  constructor(
    readonly source: string,
    readonly issues: string[],
  ) {
    super(`Invalid points scale catalogue ${source}: ${issues.join('; ')}`);
    this.name = 'PointsScaleCatalogueError';
  }
}

export class PointsScaleCatalogue implements PointsScaleProvider {
  private readonly scales: Map<string, PointsScale>;

  constructor(scales: ReadonlyArray<PointsScale>) {
    this.scales = new Map(scales.map((scale) => [scale.schemeId, scale]));
  }

  static parse(payload: unknown, source = 'inline'): PointsScaleCatalogue {
    const parsed = catalogueSchema.safeParse(payload);

    if (!parsed.success) {
      throw new PointsScaleCatalogueError(
        source,
        parsed.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
        ),
      );
    }

    return new PointsScaleCatalogue(
      parsed.data.scales.map((scale) =>
        Object.freeze({
          schemeId: scale.schemeId,
          fieldSize: scale.fieldSize,
          points: Object.freeze(
            Object.fromEntries(
              Object.entries(scale.points).map(([position, points]) => [Number(position), points]),
            ),
          ),
        }),
      ),
    );
  }

  static async load(filePath: string): Promise<PointsScaleCatalogue> {
    const contents = await readFile(filePath, 'utf8');

    let payload: unknown;
    try {
      payload = JSON.parse(contents);
    } catch (error) {
      throw new PointsScaleCatalogueError(filePath, [
        error instanceof Error ? error.message : 'File is not valid JSON.',
      ]);
    }

    return PointsScaleCatalogue.parse(payload, filePath);
  }

  get(schemeId: string): PointsScale | null {
    return this.scales.get(schemeId) ?? null;
  }

  list(): PointsScale[] {
    return [...this.scales.values()];
  }
}
