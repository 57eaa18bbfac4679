const THOUSANDS_SEPARATOR = /,(?=\d{3}(\D|$))/g;

export const toOptionalNumber = (value: unknown): number | undefined => {
    if (typeof value === "number" && Number.isFinite(value)) {
        return value;
    }
    if (typeof value === "string") {
        const trimmed = value.trim().replace(THOUSANDS_SEPARATOR, "");
        if (trimmed !== "") {
            const parsed = Number(trimmed);
            if (Number.isFinite(parsed)) {
                return parsed;
            }
        }
    }
    return undefined;
};

export const isBlank = (value: unknown): boolean =>
    value === undefined ||
    value === null ||
    (typeof value === "string" && value.trim() === "");

export const mean = (values: number[]): number | null =>
    values.length
        ? values.reduce((acc, value) => acc + value, 0) / values.length
        : null;
