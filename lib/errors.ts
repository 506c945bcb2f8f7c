export const FALLBACK_ERROR_MESSAGE = "Something went wrong. Please try again.";

export function getErrorMessage(error: unknown) {
  if (error instanceof Error && error.message.trim()) return error.message;
  return FALLBACK_ERROR_MESSAGE;
}
