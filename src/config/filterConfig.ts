/**
 * Admission filter applied to every pair that clears the reputation,
 * fake-volume and blacklist gates.
 */

import { z } from 'zod';
import { DEFAULT_FILTERS } from './constants';

export const FilterConfigSchema = z.object({
    minLiquidity: z.number().finite().nonnegative(),
    minVolume24h: z.number().finite().nonnegative(),
    minPriceChange: z.number().finite(),
});

export type FilterConfigValues = z.infer<typeof FilterConfigSchema>;

export class FilterConfig {
    readonly minLiquidity: number;
    readonly minVolume24h: number;
    readonly minPriceChange: number;

    /**
     * @throws ZodError when a bound is non-finite or a liquidity/volume bound is negative
     */
    constructor(values: Partial<FilterConfigValues> = {}) {
        const parsed = FilterConfigSchema.parse({ ...DEFAULT_FILTERS, ...values });
        this.minLiquidity = parsed.minLiquidity;
        this.minVolume24h = parsed.minVolume24h;
        this.minPriceChange = parsed.minPriceChange;
    }

    passes(liquidityUsd: number, volume24h: number, priceChange24h: number): boolean {
        return (
            liquidityUsd >= this.minLiquidity &&
            volume24h >= this.minVolume24h &&
            priceChange24h >= this.minPriceChange
        );
    }

    toJSON(): FilterConfigValues {
        return {
            minLiquidity: this.minLiquidity,
            minVolume24h: this.minVolume24h,
            minPriceChange: this.minPriceChange,
        };
    }
}
