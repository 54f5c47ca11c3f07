import { GoogleGenAI } from "@google/genai";
import { env } from "../env";

const ai = env.GEMINI_API_KEY ? new GoogleGenAI({ apiKey: env.GEMINI_API_KEY }) : null;

/** Null when no API key is configured or the model returns no text. */
export async function generateText({
  model = env.GEMINI_MODEL,
  systemInstruction,
  userMessage,
}: {
  model?: string;
  systemInstruction: string;
  userMessage: string;
}): Promise<string | null> {
  if (!ai) return null;
  const resp = await ai.models.generateContent({
    model,
    contents: userMessage,
    config: { systemInstruction, temperature: 0.2 },
  });
  return resp.text ?? null;
}
