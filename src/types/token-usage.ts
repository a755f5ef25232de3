export interface TokenUsage {
    inputTokens: number;
    outputTokens: number;
}

export interface TokenUsageStats {
    totalInputTokens: number;
    totalOutputTokens: number;
    /** Present only when both prices are known. */
    totalCost?: number;
}

/** USD per million tokens, from INPUT_PRICE_PER_MILLION / OUTPUT_PRICE_PER_MILLION. */
export interface PricingConfig {
    inputPricePerMillion?: number | undefined;
    outputPricePerMillion?: number | undefined;
}

const TOKENS_PER_PRICE_UNIT = 1_000_000;

// Undefined unless both prices are set
export function calculateCost(usage: TokenUsage, pricing?: PricingConfig): number | undefined {
    const inputPrice = pricing?.inputPricePerMillion;
    const outputPrice = pricing?.outputPricePerMillion;
    if (inputPrice === undefined || outputPrice === undefined) {
        return undefined;
    }
    return (
        (usage.inputTokens * inputPrice + usage.outputTokens * outputPrice) / TOKENS_PER_PRICE_UNIT
    );
}

/*
 * Running token totals across many extractor calls. One counter per batch.
 */
export class TokenUsageCounter {
    private inputTokens = 0;
    private outputTokens = 0;

    add(usage: TokenUsage | undefined): void {
        if (!usage) return;
        this.inputTokens += usage.inputTokens;
        this.outputTokens += usage.outputTokens;
    }

    stats(pricing?: PricingConfig): TokenUsageStats {
        const totals = { inputTokens: this.inputTokens, outputTokens: this.outputTokens };
        const cost = calculateCost(totals, pricing);
        return {
            totalInputTokens: this.inputTokens,
            totalOutputTokens: this.outputTokens,
            ...(cost !== undefined && { totalCost: cost }),
        };
    }
}
