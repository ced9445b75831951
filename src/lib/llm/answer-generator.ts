import type OpenAI from "openai";
import { describeError, UpstreamUnavailableError } from "@/lib/errors";
import type { AnswerGenerator, SummaryLength } from "@/types/retrieval";

export type TranscriptLanguage = "en" | "ar" | "es" | "it" | "sv";

export const LANGUAGE_PROMPTS: Record<TranscriptLanguage, string> = {
  en:
    "You are a precise assistant answering questions strictly based on the content of the YouTube video transcript provided. " +
    "If the answer is not clearly stated in the transcript, say you cannot find the answer. " +
    "Do not guess or add unrelated information. Only use the transcript to answer. Stay on-topic, concise, and evidence-based.",
  ar:
    "أنت مساعد دقيق تجيب على الأسئلة فقط بناءً على محتوى نص الفيديو من يوتيوب. " +
    "إذا لم يكن الجواب مذكورًا بوضوح في النص، قل أنك لا تستطيع العثور عليه. " +
    "لا تخمن أو تضف معلومات غير متعلقة. استخدم النص فقط للإجابة وكن دقيقًا.",
  es:
    "Eres un asistente preciso que responde estrictamente con base en el contenido del video de YouTube. " +
    "Si la respuesta no está claramente indicada en la transcripción, di que no puedes encontrarla. " +
    "No inventes información ni salgas del tema. Usa solo la transcripción.",
  it:
    "Sei un assistente preciso che risponde solo in base al contenuto del video YouTube. " +
    "Se la risposta non è chiaramente indicata nella trascrizione, dichiara di non poterla trovare. " +
    "Non indovinare né aggiungere informazioni non pertinenti. Usa solo la trascrizione.",
  sv:
    "Du är en noggrann assistent som bara svarar baserat på innehållet i YouTube-videons transkript. " +
    "Om svaret inte tydligt framgår, säg att du inte kan hitta det. Gissa inte och håll dig till ämnet.",
};

export const SUMMARY_SYSTEM_PROMPT =
  "You summarize YouTube videos using only the transcript provided. Do not add information that is not in the transcript.";

export const SUMMARY_PRESETS: Record<SummaryLength, { instructions: Record<TranscriptLanguage, string>; maxTokens: number }> =
  {
    short: {
      maxTokens: 100,
      instructions: {
        en: "Summarize the video briefly in 2-3 sentences.",
        ar: "لخص محتوى الفيديو بإيجاز في جملتين أو ثلاث.",
        es: "Resume el contenido del video en 2 o 3 frases.",
        it: "Riassumi brevemente il contenuto del video in 2 o 3 frasi.",
        sv: "Sammanfatta videons innehåll kortfattat i 2–3 meningar.",
      },
    },
    medium: {
      maxTokens: 250,
      instructions: {
        en: "Summarize the main points of the video.",
        ar: "لخص النقاط الرئيسية في الفيديو.",
        es: "Resume los puntos principales del video.",
        it: "Riassumi i punti principali del video.",
        sv: "Sammanfatta huvudpunkterna i videon.",
      },
    },
    detailed: {
      maxTokens: 500,
      instructions: {
        en: "Write a detailed summary of the video content.",
        ar: "اكتب ملخصًا مفصلًا لمحتوى الفيديو.",
        es: "Escribe un resumen detallado del contenido del video.",
        it: "Scrivi un riassunto dettagliato del contenuto del video.",
        sv: "Skriv en detaljerad sammanfattning av videons innehåll.",
      },
    },
  };

// Marker words checked in order; the first match wins and English is the default.
const LANGUAGE_MARKERS: ReadonlyArray<[TranscriptLanguage, readonly string[]]> = [
  ["ar", ["ال"]],
  ["es", [" el ", " la "]],
  ["it", [" il ", " lo "]],
  ["sv", [" och ", " att "]],
];

export function detectTranscriptLanguage(context: readonly string[]): TranscriptLanguage {
  const text = context.join("\n\n");
  const match = LANGUAGE_MARKERS.find(([, markers]) => markers.some((marker) => text.includes(marker)));
  return match ? match[0] : "en";
}

type OpenAiAnswerGeneratorOptions = {
  model: string;
  summaryModel?: string;
  answerMaxTokens?: number;
};

type CompletionRequest = {
  model: string;
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
};

export function buildUserMessage(prompt: string, context: string[]): string {
  return `${prompt}\n\nTranscript:\n${context.join("\n\n")}`;
}

export class OpenAiAnswerGenerator implements AnswerGenerator {
  constructor(
    private readonly client: OpenAI,
    private readonly options: OpenAiAnswerGeneratorOptions,
  ) {}

  answer(question: string, context: string[]): Promise<string> {
    return this.complete(this.answerRequest(question, context));
  }

  async *answerStream(question: string, context: string[]): AsyncGenerator<string> {
    const request = this.answerRequest(question, context);

    try {
      const stream = await this.client.chat.completions.create({
        model: request.model,
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        stream: true,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user },
        ],
      });

      for await (const chunk of stream) {
        const token = chunk.choices[0]?.delta?.content;

        if (token) {
          yield token;
        }
      }
    } catch (error) {
      throw new UpstreamUnavailableError(`Failed to stream completion: ${describeError(error)}`, { cause: error });
    }
  }

  summarize(context: string[], length: SummaryLength): Promise<string> {
    const preset = SUMMARY_PRESETS[length];

    return this.complete({
      model: this.options.summaryModel ?? this.options.model,
      system: SUMMARY_SYSTEM_PROMPT,
      user: buildUserMessage(preset.instructions[detectTranscriptLanguage(context)], context),
      temperature: 0.3,
      maxTokens: preset.maxTokens,
    });
  }

  private answerRequest(question: string, context: string[]): CompletionRequest {
    return {
      model: this.options.model,
      system: LANGUAGE_PROMPTS[detectTranscriptLanguage(context)],
      user: buildUserMessage(question, context),
      temperature: 0.2,
      maxTokens: this.options.answerMaxTokens ?? 500,
    };
  }

  private async complete(request: CompletionRequest): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create({
        model: request.model,
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user },
        ],
      });

      return completion.choices[0]?.message.content?.trim() ?? "";
    } catch (error) {
      throw new UpstreamUnavailableError(`Failed to generate completion: ${describeError(error)}`, { cause: error });
    }
  }
}
