import type { Language } from './types.js';

/**
 * Label strings the UI renders around the conversation.
 * Every language must provide every key; adding a language to `Language`
 * fails the build until its table exists here.
 */
export interface UiTexts {
  title: string;
  intro: string;
  placeholder: string;
  wrapUp: string;
  wrapUpHelp: string;
  chatHistory: string;
  noHistory: string;
  you: string;
  assistant: string;
  date: string;
  session: string;
  languageButton: string;
}

export const UI_TEXTS = {
  en: {
    title: 'Martin - Your AI Psychologist',
    intro: 'Hi there, please have a seat. What brings you in today?',
    placeholder: 'Enter your message here...',
    wrapUp: 'WRAP UP SESSION',
    wrapUpHelp: 'Click to end the session',
    chatHistory: '📜 Chat History',
    noHistory: 'No chat history yet',
    you: 'You',
    assistant: 'Martin',
    date: 'Date',
    session: 'Q/A',
    languageButton: '🇫🇷 Français'
  },
  fr: {
    title: 'Martin - votre psychologue IA',
    intro: "Bonjour, installez-vous confortablement. Qu'est-ce qui vous amène aujourd'hui ?",
    placeholder: 'Entrez votre message ici...',
    wrapUp: 'TERMINER LA SESSION',
    wrapUpHelp: 'Cliquez pour terminer la session',
    chatHistory: '📜 Historique des conversations',
    noHistory: 'Aucun historique pour le moment',
    you: 'Vous',
    assistant: 'Martin',
    date: 'Date',
    session: 'Q/A',
    languageButton: '🇺🇸 English'
  }
} as const satisfies Record<Language, UiTexts>;

export function getUiTexts(language: Language): UiTexts {
  return UI_TEXTS[language];
}

export function toggleLanguage(language: Language): Language {
  switch (language) {
    case 'en':
      return 'fr';
    case 'fr':
      return 'en';
  }
}
