import { useEffect } from "react";
import { router } from "expo-router";
import { LoadingScreen } from "../components/LoadingScreen";

// Clerk finishes the SSO session in the sign-in screen; this route only hands control back.
export default function OAuthNativeCallbackScreen() {
  useEffect(() => {
    const timer = setTimeout(() => {
      router.replace("/sign-in");
    }, 250);

    return () => clearTimeout(timer);
  }, []);

  return <LoadingScreen />;
}
