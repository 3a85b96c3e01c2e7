import { describe, it, expect } from 'vitest';
import { UsageLedger, calculateCost, type PricingConfig } from '../src/types/token-usage';

const PRICING: PricingConfig = { inputPricePerMillion: 2.5, outputPricePerMillion: 10 };

describe('calculateCost', () => {
    it('prices input and output tokens per million', () => {
        expect(calculateCost({ inputTokens: 400_000, outputTokens: 100_000 }, PRICING)).toBe(2);
    });

    it('is undefined unless both rates are set', () => {
        const usage = { inputTokens: 100, outputTokens: 100 };
        expect(calculateCost(usage)).toBeUndefined();
        expect(calculateCost(usage, { inputPricePerMillion: 1 })).toBeUndefined();
        expect(calculateCost(usage, { outputPricePerMillion: 1 })).toBeUndefined();
    });
});

describe('UsageLedger', () => {
    it('totals usage across documents and breaks it down by id', () => {
        const ledger = new UsageLedger();
        ledger.add([
            { probeId: 'performance-targets', usage: { inputTokens: 300, outputTokens: 40 } },
            { probeId: 'historical-outcomes', usage: { inputTokens: 500, outputTokens: 80 } },
        ]);
        ledger.add([{ probeId: 'historical-outcomes', usage: { inputTokens: 400, outputTokens: 10 } }]);

        expect(ledger.total()).toEqual({ inputTokens: 1200, outputTokens: 130 });
        expect(ledger.breakdown()).toEqual({
            'historical-outcomes': { requests: 2, inputTokens: 900, outputTokens: 90 },
            'performance-targets': { requests: 1, inputTokens: 300, outputTokens: 40 },
        });
        expect(Object.keys(ledger.breakdown())).toEqual(['historical-outcomes', 'performance-targets']);
    });

    it('prices each breakdown entry when rates are configured', () => {
        const ledger = new UsageLedger();
        ledger.add([{ probeId: 'quality-measures', usage: { inputTokens: 1_000_000, outputTokens: 200_000 } }]);

        expect(ledger.breakdown(PRICING)).toEqual({
            'quality-measures': { requests: 1, inputTokens: 1_000_000, outputTokens: 200_000, cost: 4.5 },
        });
    });

    it('is empty before any request', () => {
        const ledger = new UsageLedger();
        expect(ledger.total()).toEqual({ inputTokens: 0, outputTokens: 0 });
        expect(ledger.breakdown(PRICING)).toEqual({});
    });
});
