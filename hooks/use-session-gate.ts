import { Platform } from "react-native";
import { useAuth } from "@clerk/clerk-expo";

export type SessionGate = "loading" | "signed-in" | "signed-out";

interface AuthState {
  isLoaded: boolean;
  isSignedIn: boolean | undefined;
}

// The web dev build opens the tabs without a session so components can be checked in a browser.
export function sessionGate({ isLoaded, isSignedIn }: AuthState, allowWebPreview: boolean): SessionGate {
  if (!isLoaded) return "loading";
  return isSignedIn || allowWebPreview ? "signed-in" : "signed-out";
}

export function useSessionGate() {
  const { isLoaded, isSignedIn } = useAuth();
  return sessionGate({ isLoaded, isSignedIn }, __DEV__ && Platform.OS === "web");
}
