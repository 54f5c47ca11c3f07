import { generateText } from "../llm/gemini-generate";
import { renderReportTemplate, type ReportFacts } from "./report";

const SYSTEM = [
  "You write short analytic notes about U.S. electric distribution reliability.",
  "SAIDI is annual outage minutes per customer, SAIFI annual interruptions per customer,",
  "CAIDI minutes per interruption. Use only the figures given; do not invent numbers.",
].join(" ");

export type Narrative = { source: "gemini" | "template"; text: string };

export async function narrateReport(
  facts: ReportFacts,
  generate: typeof generateText = generateText
): Promise<Narrative> {
  const template = renderReportTemplate(facts);
  const userMessage = [
    `Category: ${facts.category}.`,
    `Facts:\n${template}`,
    `Answer in 3 short sections: (1) National picture, (2) States to watch, (3) What drives the metrics.`,
  ].join("\n");

  try {
    const text = await generate({ systemInstruction: SYSTEM, userMessage });
    if (text) return { source: "gemini", text };
  } catch (e: unknown) {
    console.error("[narrative] gemini failed, using template:", e instanceof Error ? e.message : e);
  }
  return { source: "template", text: template };
}
