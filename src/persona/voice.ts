/**
 * Persona voice: rewrites raw model text so it reads as the persona speaking.
 */

export interface VoiceOptions {
  name: string;
  /** First exchange with this sender */
  firstContact: boolean;
}

export interface IPersonaVoice {
  apply(raw: string, options: VoiceOptions): string;
}

const AI_DISCLAIMER = /^as an ai(?: language model)?,?\s*/i;
const GREETING_SENTENCE = /^(?:hello|hi|hey|greetings)\b[^.!?]*[.!?]/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Rule-based voice. Drops "As an AI" openers, turns third-person
 * self-references at sentence starts into "I am", and introduces the persona
 * by name after an opening greeting on first contact.
 */
export class TemplateVoice implements IPersonaVoice {
  apply(raw: string, options: VoiceOptions): string {
    let text = raw.trim();

    if (AI_DISCLAIMER.test(text)) {
      text = capitalize(text.replace(AI_DISCLAIMER, ''));
    }

    const selfReference = new RegExp(
      `(^|[.!?]\\s+)(?:${escapeRegExp(options.name)}|the assistant) is\\b`,
      'gi'
    );
    text = text.replace(selfReference, '$1I am');

    if (options.firstContact && !text.toLowerCase().includes(options.name.toLowerCase())) {
      const greeting = GREETING_SENTENCE.exec(text);
      if (greeting) {
        const end = greeting[0].length;
        text = `${text.slice(0, end)} I'm ${options.name}.${text.slice(end)}`;
      }
    }

    return text;
  }
}
