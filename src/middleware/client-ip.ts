type HeaderReader = (name: string) => string | undefined;

/** First forwarded address, falling back to x-real-ip. */
export function clientIp(header: HeaderReader): string {
  return (
    header("x-forwarded-for")?.split(",")[0]?.trim() ||
    header("x-real-ip") ||
    "unknown"
  );
}
