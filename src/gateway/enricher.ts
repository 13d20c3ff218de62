export interface PromptEnricher {
  enrich(userId: number, prompt: string, sessionId?: string): Promise<string>;
}

export interface ContextEnricherOptions {
  /** Free-form profile text, or a loader for it. */
  profile?: string | (() => Promise<string | undefined>);
  /** A language name, or "auto" to mirror the user. */
  language: string;
  timezone: string;
  now?: () => Date;
}

function formatUtc(date: Date): string {
  return date.toISOString().slice(0, 16).replace("T", " ");
}

/** Prepends profile, language and time sections to the prompt. */
export function createContextEnricher(options: ContextEnricherOptions): PromptEnricher {
  const now = options.now ?? (() => new Date());

  return {
    async enrich(_userId: number, prompt: string): Promise<string> {
      const sections: string[] = [];

      const profile = typeof options.profile === "function" ? await options.profile() : options.profile;
      if (profile?.trim()) sections.push(`## User Profile\n${profile.trim()}`);

      const language = options.language.trim();
      if (language && language.toLowerCase() !== "auto") {
        sections.push(`## Language\nAlways respond in ${language}, regardless of what language the user writes in.`);
      } else {
        sections.push(
          "## Language\nDetect the language the user writes in and respond in that same language. " +
            "If they switch languages, follow their lead."
        );
      }

      sections.push(`## Current Context\nTime: ${formatUtc(now())} UTC (Timezone: ${options.timezone})`);

      return `${sections.join("\n\n")}\n\n---\n\n${prompt}`;
    },
  };
}

/** Leaves the prompt untouched. */
export const passthroughEnricher: PromptEnricher = {
  async enrich(_userId: number, prompt: string): Promise<string> {
    return prompt;
  },
};
