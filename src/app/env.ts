export const clamp = (value: number, min: number, max: number): number => {
  if (!Number.isFinite(value)) {
    return min;
  }
  return Math.max(min, Math.min(max, value));
};

export const parseBooleanFlag = (value?: string | null, defaultValue = false): boolean => {
  if (typeof value !== "string") {
    return defaultValue;
  }
  const normalised = value.trim().toLowerCase();
  if (normalised === "1" || normalised === "true" || normalised === "yes") {
    return true;
  }
  if (normalised === "0" || normalised === "false" || normalised === "no") {
    return false;
  }
  return defaultValue;
};

type NumericOptions = {
  min: number;
  max: number;
  integer?: boolean;
};

export const parseNumericEnv = (value: string | null | undefined, options: NumericOptions): number | null => {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parsed = options.integer ? Number.parseInt(trimmed, 10) : Number.parseFloat(trimmed);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  return clamp(parsed, options.min, options.max);
};

export const parseChoice = <T extends string>(
  value: string | null | undefined,
  choices: ReadonlyArray<T>,
  defaultValue: T,
): T => {
  const normalised = value?.trim().toLowerCase();
  return choices.find((c) => c === normalised) ?? defaultValue;
};
