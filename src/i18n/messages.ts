export const LOCALES = ["ru", "en"] as const;

export type Locale = (typeof LOCALES)[number];

export interface Messages {
  commandPrompt: string;
  datePrompt: string;
  contentPrompt: string;
  dayPrompt: string;
  weekPrompt: string;
  noteAdded: string;
  notesSaved: string;
  noNotes: string;
  farewell: string;
  unknownCommand: string;
  loadFailed: (detail: string) => string;
  saveFailed: (detail: string) => string;
  fatalError: (detail: string) => string;
}

const ru: Messages = {
  commandPrompt: "Введите команду (add, load, save, day, week, exit):",
  datePrompt: "Введите дату (например, 2024-09-24 19:00):",
  contentPrompt: "Введите содержание записи:",
  dayPrompt: "Введите дату для поиска (например, 2024-09-24):",
  weekPrompt: "Введите дату начала недели (например, 2024-09-23):",
  noteAdded: "Запись добавлена.",
  notesSaved: "Записи сохранены.",
  noNotes: "Нет записей.",
  farewell: "Выход из программы.",
  unknownCommand: "Неизвестная команда.",
  loadFailed: (detail) => `Ошибка загрузки записей: ${detail}`,
  saveFailed: (detail) => `Ошибка сохранения записей: ${detail}`,
  fatalError: (detail) => `Программа завершена из-за ошибки: ${detail}`,
};

const en: Messages = {
  commandPrompt: "Enter a command (add, load, save, day, week, exit):",
  datePrompt: "Enter the date (e.g. 2024-09-24 19:00):",
  contentPrompt: "Enter the note text:",
  dayPrompt: "Enter the day to show (e.g. 2024-09-24):",
  weekPrompt: "Enter the first day of the week (e.g. 2024-09-23):",
  noteAdded: "Note added.",
  notesSaved: "Notes saved.",
  noNotes: "No notes.",
  farewell: "Exiting.",
  unknownCommand: "Unknown command.",
  loadFailed: (detail) => `Failed to load notes: ${detail}`,
  saveFailed: (detail) => `Failed to save notes: ${detail}`,
  fatalError: (detail) => `Stopped on error: ${detail}`,
};

const CATALOGS: Record<Locale, Messages> = { ru, en };

export function getMessages(locale: Locale): Messages {
  return CATALOGS[locale];
}
