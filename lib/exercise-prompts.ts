import type { Difficulty } from "@/types/practice";

export type ChatPrompt = { system: string; user: string };

const DIFFICULTY_GUIDANCE: Record<Difficulty, string> = {
  easy: "basic level, fundamental concepts",
  medium: "intermediate level, needs several steps",
  hard: "advanced level, needs critical thinking",
};

function languageLine(language: string) {
  return `Write every piece of text for the student in ${language}.`;
}

type ExercisePromptParams = {
  topic: string;
  context: string;
  difficulty: Difficulty;
  course?: string | null;
  language: string;
};

export function buildExercisePrompt(params: ExercisePromptParams): ChatPrompt {
  const { topic, context, difficulty, course, language } = params;

  const system = [
    `You are an expert mathematics teacher who writes didactic exercises.`,
    languageLine(language),
    `Respond with a single JSON object and nothing else.`,
  ].join("\n");

  const userLines = [
    `Create ONE exercise.`,
    `Topic: ${topic}`,
    `Course: ${course || "Not specified"}`,
    `Difficulty: ${DIFFICULTY_GUIDANCE[difficulty]}`,
  ];

  const cleanContext = context.trim();
  if (cleanContext) {
    userLines.push(`\nTextbook context:`);
    userLines.push(cleanContext);
  }

  userLines.push(
    `\nJSON Schema: { content: string, solution: string (final result only), methodology: string (detailed steps), available_procedures: [{ id: number, name: string, description: string }], expected_procedures: number[] }`,
    `Procedures: list 6-10 specific techniques, properties or rules (e.g. "Distributive property"), some needed and some not applicable. Each needs a 1-2 line description of what it is and when it applies.`,
    `expected_procedures holds the ids needed to solve the exercise correctly.`,
    `The exercise must follow the textbook content, state every datum it needs, and have a single verifiable solution.`
  );

  return { system, user: userLines.join("\n") };
}

type EvaluationPromptParams = {
  exercise: string;
  expectedSolution: string;
  expectedMethodology: string;
  studentAnswer: string;
  studentMethodology: string;
  language: string;
};

export function buildEvaluationPrompt(params: EvaluationPromptParams): ChatPrompt {
  const system = [
    `You are an expert mathematics teacher grading student work.`,
    languageLine(params.language),
    `Respond with a single JSON object and nothing else.`,
  ].join("\n");

  const user = [
    `EXERCISE:\n${params.exercise}`,
    `EXPECTED SOLUTION:\n${params.expectedSolution}`,
    `EXPECTED METHODOLOGY:\n${params.expectedMethodology}`,
    `STUDENT ANSWER:\n${params.studentAnswer}`,
    `STUDENT METHODOLOGY:\n${params.studentMethodology}`,
    `JSON Schema: { is_correct_result: boolean, is_correct_methodology: boolean, errors_found: string[], feedback: string }`,
    `is_correct_methodology stays true when the procedure is right despite minor arithmetic slips. errors_found lists specific conceptual or procedural errors. feedback is a short didactic explanation.`,
  ].join("\n\n");

  return { system, user };
}

type FeedbackPromptParams = {
  exercise: string;
  studentAnswer: string;
  studentMethodology: string;
  errors: string[];
  context?: string | null;
  language: string;
};

export function buildFeedbackPrompt(params: FeedbackPromptParams): ChatPrompt {
  const system = [`You are a patient, didactic mathematics tutor.`, languageLine(params.language)].join("\n");

  const lines = [
    `EXERCISE:\n${params.exercise}`,
    `STUDENT ANSWER:\n${params.studentAnswer}`,
    `STUDENT METHODOLOGY:\n${params.studentMethodology}`,
    `ERRORS FOUND:\n${params.errors.join(", ")}`,
  ];
  if (params.context?.trim()) {
    lines.push(`TEXTBOOK CONTEXT:\n${params.context.trim()}`);
  }
  lines.push(
    `Write feedback that points at where the error is, why it is wrong and how to approach it correctly, with an encouraging tone and one hint or example. At most 200 words.`
  );

  return { system, user: lines.join("\n\n") };
}

export function buildHintPrompt(exercise: string, context: string | null | undefined, language: string): ChatPrompt {
  const system = [
    `You are a mathematics tutor who gives useful hints without revealing the solution.`,
    languageLine(language),
  ].join("\n");

  const lines = [`Write a hint for this exercise:\n${exercise}`];
  if (context?.trim()) {
    lines.push(`Textbook context:\n${context.trim()}`);
  }
  lines.push(`Point at the first step or key concept, keep it under 50 words, and do not give away the answer.`);

  return { system, user: lines.join("\n\n") };
}

export function buildVisualSchemePrompt(
  exercise: string,
  context: string | null | undefined,
  language: string
): ChatPrompt {
  const system = [
    `You are a mathematics tutor who explains solution strategies with diagrams.`,
    languageLine(language),
    `Respond with Mermaid flowchart source only, without code fences.`,
  ].join("\n");

  const lines = [`Draw a visual scheme of the strategy for this exercise:\n${exercise}`];
  if (context?.trim()) {
    lines.push(`Textbook context:\n${context.trim()}`);
  }
  lines.push(`Start with "flowchart TD". Show the steps as nodes without computing the final result.`);

  return { system, user: lines.join("\n\n") };
}

export type SourceMetadata = {
  title?: string | null;
  course?: string | null;
  subject?: string | null;
};

export function buildTopicExtractionPrompt(sampleText: string, metadata: SourceMetadata, language: string): ChatPrompt {
  const system = [
    `You analyse educational content.`,
    languageLine(language),
    `Respond with a single JSON object and nothing else.`,
  ].join("\n");

  const user = [
    `Extract the topics and subtopics of this textbook.`,
    `TITLE: ${metadata.title || "Untitled"}`,
    `COURSE: ${metadata.course || "Not specified"}`,
    `SUBJECT: ${metadata.subject || "Mathematics"}`,
    `TEXT:\n${sampleText}`,
    `JSON Schema: { topics: [{ name: string, description: string }] }`,
    `Look for a table of contents first if there is one.`,
  ].join("\n\n");

  return { system, user };
}

type SummaryPromptParams = {
  topic: string;
  context: string;
  course?: string | null;
  language: string;
};

export function buildTopicSummaryPrompt(params: SummaryPromptParams): ChatPrompt {
  const system = [
    `You are an expert mathematics teacher who writes complete study material.`,
    languageLine(params.language),
  ].join("\n");

  const user = [
    `Write a study summary.`,
    `TOPIC: ${params.topic}`,
    `COURSE: ${params.course || "Not specified"}`,
    `TEXTBOOK CONTENT:\n${params.context}`,
    `Sections: key concepts, important definitions, formulas and properties, step-by-step procedures, 1-2 fully solved examples, tips to avoid common mistakes, links to other topics.`,
    `Use Markdown headings, stay between 800 and 1200 words, and base everything on the textbook content.`,
  ].join("\n\n");

  return { system, user };
}
