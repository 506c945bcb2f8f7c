import { useState } from "react";
import { ActivityIndicator, Pressable, StyleSheet, Text, TextInput, View } from "react-native";
import { useSSO, useSignIn } from "@clerk/clerk-expo";
import { router } from "expo-router";
import { getErrorMessage } from "../lib/errors";
import { useTheme } from "../lib/theme";

type SubmittingMethod = "password" | "google" | null;

export default function SignInScreen() {
  const theme = useTheme();
  const { startSSOFlow } = useSSO();
  const { isLoaded, signIn, setActive } = useSignIn();
  const [email, setEmail] = useState("");
  const [password, setPassword] = useState("");
  const [error, setError] = useState<string | null>(null);
  const [submitting, setSubmitting] = useState<SubmittingMethod>(null);

  const finishSignIn = () => router.replace("/(tabs)/today");

  const handleSignIn = async () => {
    if (!isLoaded) return;
    if (!email.trim() || !password) {
      setError("Enter your email and password.");
      return;
    }
    setError(null);
    setSubmitting("password");

    try {
      const result = await signIn.create({ identifier: email.trim(), password });

      if (result.status === "complete" && result.createdSessionId) {
        await setActive({ session: result.createdSessionId });
        finishSignIn();
      } else {
        setError("Additional verification is required.");
      }
    } catch (err) {
      setError(getErrorMessage(err));
    } finally {
      setSubmitting(null);
    }
  };

  const handleGoogleSignIn = async () => {
    if (!isLoaded) return;
    setError(null);
    setSubmitting("google");

    try {
      const { createdSessionId, setActive: setSSOActive } = await startSSOFlow({
        strategy: "oauth_google",
      });

      if (createdSessionId && setSSOActive) {
        await setSSOActive({ session: createdSessionId });
        finishSignIn();
      } else {
        setError("Additional verification is required.");
      }
    } catch (err) {
      setError(getErrorMessage(err));
    } finally {
      setSubmitting(null);
    }
  };

  const inputStyle = [
    styles.input,
    { borderColor: theme.colors.border, color: theme.colors.primaryText },
  ];

  return (
    <View style={[styles.container, { backgroundColor: theme.colors.background }]}>
      <Text style={[styles.title, { color: theme.colors.primaryText }]}>Welcome back</Text>
      <Text style={[styles.subtitle, { color: theme.colors.secondaryText }]}>
        Sign in to see your family's patterns.
      </Text>

      <Pressable
        style={({ pressed }) => [
          styles.secondaryButton,
          { borderColor: theme.colors.border },
          pressed && styles.buttonPressed,
          submitting === "google" && styles.buttonDisabled,
        ]}
        onPress={handleGoogleSignIn}
        disabled={submitting !== null}
      >
        {submitting === "google" ? (
          <ActivityIndicator color={theme.colors.primaryText} />
        ) : (
          <Text style={[styles.secondaryButtonText, { color: theme.colors.primaryText }]}>
            Continue with Google
          </Text>
        )}
      </Pressable>

      <Text style={[styles.orText, { color: theme.colors.secondaryText }]}>or use email</Text>

      <TextInput
        style={inputStyle}
        placeholder="Email"
        placeholderTextColor={theme.colors.tertiaryText}
        keyboardType="email-address"
        autoCapitalize="none"
        value={email}
        onChangeText={setEmail}
      />
      <TextInput
        style={inputStyle}
        placeholder="Password"
        placeholderTextColor={theme.colors.tertiaryText}
        secureTextEntry
        value={password}
        onChangeText={setPassword}
      />

      {error ? <Text style={[styles.error, { color: theme.colors.error }]}>{error}</Text> : null}

      <Pressable
        style={({ pressed }) => [
          styles.primaryButton,
          { backgroundColor: theme.colors.primaryText },
          pressed && styles.buttonPressed,
          submitting === "password" && styles.buttonDisabled,
        ]}
        onPress={handleSignIn}
        disabled={submitting !== null}
      >
        {submitting === "password" ? (
          <ActivityIndicator color={theme.colors.background} />
        ) : (
          <Text style={[styles.primaryButtonText, { color: theme.colors.background }]}>Sign In</Text>
        )}
      </Pressable>
    </View>
  );
}

const styles = StyleSheet.create({
  container: {
    flex: 1,
    padding: 24,
    justifyContent: "center",
  },
  title: {
    fontSize: 28,
    fontWeight: "700",
    marginBottom: 8,
  },
  subtitle: {
    fontSize: 14,
    marginBottom: 24,
  },
  input: {
    borderWidth: 1,
    borderRadius: 12,
    paddingHorizontal: 14,
    paddingVertical: 12,
    fontSize: 16,
    marginBottom: 12,
  },
  primaryButton: {
    borderRadius: 12,
    paddingVertical: 14,
    alignItems: "center",
    marginTop: 4,
  },
  primaryButtonText: {
    fontSize: 16,
    fontWeight: "600",
  },
  secondaryButton: {
    borderWidth: 1,
    borderRadius: 12,
    paddingVertical: 14,
    alignItems: "center",
    marginBottom: 12,
  },
  secondaryButtonText: {
    fontSize: 16,
    fontWeight: "600",
  },
  orText: {
    fontSize: 12,
    textAlign: "center",
    marginBottom: 12,
  },
  buttonPressed: {
    opacity: 0.85,
  },
  buttonDisabled: {
    opacity: 0.65,
  },
  error: {
    marginBottom: 8,
  },
});
