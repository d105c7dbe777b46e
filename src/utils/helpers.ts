export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const asString = (value: unknown, fallback = ""): string => {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "bigint") {
    return String(value);
  }
  return fallback;
};

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

// Buffer.from(..., "base64") never throws, so malformed input has to be rejected up front.
export const decodeBase64 = (value: string): Buffer => {
  const compact = value.replace(/\s+/g, "");
  if (!BASE64_PATTERN.test(compact)) {
    throw new Error("Invalid base64 input");
  }
  return Buffer.from(compact, "base64");
};

export const encodeBase64 = (value: string | Uint8Array): string =>
  typeof value === "string"
    ? Buffer.from(value, "utf8").toString("base64")
    : Buffer.from(value).toString("base64");

export const describeBody = (body: unknown): string => {
  if (typeof body === "string") {
    return body;
  }
  try {
    return JSON.stringify(body) ?? "";
  } catch {
    return String(body);
  }
};

export const getErrorMessage = (error: unknown): string => {
  if (typeof error === "string") {
    return error;
  }

  if (error instanceof Error) {
    return error.message;
  }

  if (isRecord(error)) {
    const dataMessage = isRecord(error.data) ? error.data.message : undefined;
    if (typeof dataMessage === "string") {
      return dataMessage;
    }
  }

  return "An unknown error occurred";
};
