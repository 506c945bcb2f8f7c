function requireValue(name: string, value: string | undefined) {
  if (!value) {
    throw new Error(`Missing ${name}`);
  }
  return value;
}

// Expo inlines EXPO_PUBLIC_* only for direct `process.env.NAME` reads.
export function getApiBaseUrl() {
  return requireValue("EXPO_PUBLIC_API_BASE_URL", process.env.EXPO_PUBLIC_API_BASE_URL);
}

export function getClerkPublishableKey() {
  return requireValue("EXPO_PUBLIC_CLERK_PUBLISHABLE_KEY", process.env.EXPO_PUBLIC_CLERK_PUBLISHABLE_KEY);
}
