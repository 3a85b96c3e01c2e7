export interface TokenUsage {
    inputTokens: number;
    outputTokens: number;
}

/** Rates in currency units per million tokens; cost is reported only when both are set. */
export interface PricingConfig {
    inputPricePerMillion?: number;
    outputPricePerMillion?: number;
}

export interface ProbeUsage {
    probeId: string;
    usage: TokenUsage;
}

export interface UsageBreakdownEntry extends TokenUsage {
    requests: number;
    cost?: number;
}

export function calculateCost(usage: TokenUsage, pricing?: PricingConfig): number | undefined {
    if (pricing?.inputPricePerMillion === undefined || pricing.outputPricePerMillion === undefined) {
        return undefined;
    }
    return (
        (usage.inputTokens * pricing.inputPricePerMillion + usage.outputTokens * pricing.outputPricePerMillion) /
        1_000_000
    );
}

/**
 * Accumulates provider token usage per probe across all documents of a run.
 */
export class UsageLedger {
    private readonly probes = new Map<string, { requests: number; usage: TokenUsage }>();

    add(entries: readonly ProbeUsage[]): void {
        for (const { probeId, usage } of entries) {
            const entry = this.probes.get(probeId) ?? { requests: 0, usage: { inputTokens: 0, outputTokens: 0 } };
            entry.requests++;
            entry.usage.inputTokens += usage.inputTokens;
            entry.usage.outputTokens += usage.outputTokens;
            this.probes.set(probeId, entry);
        }
    }

    total(): TokenUsage {
        const total: TokenUsage = { inputTokens: 0, outputTokens: 0 };
        for (const { usage } of this.probes.values()) {
            total.inputTokens += usage.inputTokens;
            total.outputTokens += usage.outputTokens;
        }
        return total;
    }

    /** Per-probe totals keyed by probe id, in id order. */
    breakdown(pricing?: PricingConfig): Record<string, UsageBreakdownEntry> {
        const result: Record<string, UsageBreakdownEntry> = {};
        for (const probeId of [...this.probes.keys()].sort()) {
            const entry = this.probes.get(probeId);
            if (!entry) continue;
            const cost = calculateCost(entry.usage, pricing);
            result[probeId] = { requests: entry.requests, ...entry.usage, ...(cost !== undefined && { cost }) };
        }
        return result;
    }
}
