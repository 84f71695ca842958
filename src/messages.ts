/** User-facing texts. The bot speaks Hebrew, like the subtitles it produces. */
export const messages = {
  welcome: (maxSeconds: number) =>
    `🎬 שלח סרטון עד ${maxSeconds} שניות ואחזיר אותו עם כתוביות בעברית — מסודרות וימניות!`,
  busy: '⏳ יש עומס — נסה שוב בעוד כמה רגעים.',
  fileTooLarge: (maxMb: number) => `❌ הסרטון גדול מדי (מעל ${maxMb}MB). שלח קובץ קטן יותר.`,
  downloading: '📥 מוריד את הסרטון...',
  transcribing: '🎧 מפענח אודיו...',
  translating: '🌍 מתרגם שורות...',
  serializing: '📝 יוצר קובץ כתוביות...',
  burning: '🔥 שורף כתוביות לתוך הסרטון...',
  uploading: '📤 מעלה את הסרטון...',
  resultCaption: '✅ הנה הסרטון עם כתוביות בעברית!',
  noSpeech: '❌ לא אותרו דיבורים בסרטון.',
  tooLong: (maxSeconds: number) => `❌ הסרטון ארוך מ-${maxSeconds} שניות.`,
  processingError: '❌ שגיאה בעיבוד הסרטון. נסה שוב מאוחר יותר.',
} as const
