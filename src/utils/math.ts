export const calculateMean = (values: readonly number[]): number => {
    if (values.length === 0) return 0;
    const sum = values.reduce((a, b) => a + b, 0);
    return sum / values.length;
};

/**
 * Population standard deviation (divides by n, not n - 1).
 */
export const calculateStdDev = (values: readonly number[]): number => {
    if (values.length === 0) return 0;
    const mean = calculateMean(values);
    const variance = values.reduce((sum, v) => sum + (v - mean) * (v - mean), 0) / values.length;
    return Math.sqrt(variance);
};

export const isFiniteNumber = (value: unknown): value is number =>
    typeof value === 'number' && Number.isFinite(value);
