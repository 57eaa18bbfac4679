export type IntelligenceErrorCode =
    | "SCHEMA_ERROR"
    | "FEATURE_ERROR"
    | "MODEL_OUTPUT_ERROR"
    | "MODEL_BUNDLE_ERROR"
    | "CUSTOMER_NOT_FOUND"
    | "BATCH_TOO_LARGE"
    | "INVALID_INPUT";

export class IntelligenceError extends Error {
    constructor(
        message: string,
        public readonly code: IntelligenceErrorCode,
        public readonly details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "IntelligenceError";
    }
}

export type SchemaIssue = {
    /** Zero-based index of the offending input row, absent for column-level issues */
    row?: number;
    column?: string;
    reason: string;
};

export class SchemaError extends IntelligenceError {
    constructor(message: string, public readonly issues: SchemaIssue[] = []) {
        super(message, "SCHEMA_ERROR", { issues });
        this.name = "SchemaError";
    }
}

export class FeatureError extends IntelligenceError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, "FEATURE_ERROR", details);
        this.name = "FeatureError";
    }
}

export class ModelOutputError extends IntelligenceError {
    constructor(
        message: string,
        public readonly model: string,
        public readonly value: number
    ) {
        super(message, "MODEL_OUTPUT_ERROR", { model, value });
        this.name = "ModelOutputError";
    }
}

export class ModelBundleError extends IntelligenceError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, "MODEL_BUNDLE_ERROR", details);
        this.name = "ModelBundleError";
    }
}

export class CustomerNotFoundError extends IntelligenceError {
    constructor(public readonly customerId: string) {
        super(`Customer ${customerId} is not part of this batch`, "CUSTOMER_NOT_FOUND", {
            customerId
        });
        this.name = "CustomerNotFoundError";
    }
}

export class BatchLimitError extends IntelligenceError {
    constructor(size: number, limit: number) {
        super(
            `Batch of ${size} records exceeds the configured limit of ${limit}`,
            "BATCH_TOO_LARGE",
            { size, limit }
        );
        this.name = "BatchLimitError";
    }
}

export function formatErrorResponse(error: unknown): {
    code: IntelligenceErrorCode | "INTERNAL_ERROR";
    message: string;
    details?: Record<string, unknown>;
} {
    if (error instanceof IntelligenceError) {
        return {
            code: error.code,
            message: error.message,
            details: error.details
        };
    }
    return {
        code: "INTERNAL_ERROR",
        message: error instanceof Error ? error.message : String(error)
    };
}
