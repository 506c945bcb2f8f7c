import { Redirect } from "expo-router";
import { LoadingScreen } from "../components/LoadingScreen";
import { useSessionGate } from "../hooks/use-session-gate";

export default function Index() {
  const gate = useSessionGate();

  if (gate === "loading") return <LoadingScreen />;
  return <Redirect href={gate === "signed-in" ? "/(tabs)/today" : "/sign-in"} />;
}
