import { areaLabel, type DbAd } from "@safehost/shared";

export const INTRO_TEXT =
  "🏡 מחפשים מקום בטוח? רוצים לעזור למישהו שצריך? 🤝\n\n" +
  "הבוט הזה מחבר בין אנשים שנפגע להם הבית, שאין להם ממ\"ד או מקלט, או שפשוט רוצים להיות עם אחרים ולהרגיש בטוחים – " +
  "לבין אנשים שרוצים לפתוח את הבית. 💗\n\n" +
  "✨ כאן אפשר:\n" +
  "• 📤 לפרסם מודעת אירוח\n" +
  "• 📋 לצפות בכל המודעות\n" +
  "• 🔎 לסנן לפי אזור\n" +
  "• ✏️ לערוך או למחוק את המודעות שלך\n" +
  "• 🚩 לדווח על מודעות לא הולמות\n\n" +
  "🛑 חשוב: אל תשתפו מידע אישי רגיש (כתובת מלאה, תעודת זהות). הבוט הוא פלטפורמת תיווך בלבד – " +
  "האחריות על ההתקשרות היא שלכם.\n\n" +
  "🙏 תודה שאתם כאן 💙";

export const TEXT = {
  chooseAction: "בחר/י פעולה:",
  askName: "📋 בוא/י ניצור מודעה חדשה. איך קוראים לך?",
  badName: "❗ השם צריך להכיל אותיות בלבד.",
  askPhone: "📞 מה מספר הטלפון שלך?",
  badPhone: "❗ מספר טלפון לא חוקי. הזן/י 7–15 ספרות בלבד.",
  askArea: "📍 בחר/י אזור:",
  askCity: "🏘️ מה שם העיר שלך?",
  badCity: "❗ שם העיר צריך להכיל אותיות בלבד.",
  askCapacity: "👥 כמה אנשים את/ה יכול/ה לארח? (1–100)",
  badCapacity: "❗ הזן/י מספר בין 1 ל-100.",
  askDate: (example: string) => `📅 מאיזה תאריך את/ה יכול/ה לארח? (פורמט YYYY-MM-DD, לדוגמא ${example})`,
  badDate: (example: string) => `❗ תאריך לא חוקי. פורמט YYYY-MM-DD, לדוגמא ${example}`,
  published: "✅ המודעה פורסמה בהצלחה!",
  publishFailed: "❌ לא הצלחנו לשמור את המודעה. הפרטים לא נמחקו – שלח/י שוב את התאריך כדי לנסות שוב.",
  askEditField: "🔧 מה ברצונך לערוך?",
  askEditArea: "📍 בחר/י אזור חדש:",
  askEditValue: "✏️ הזן/י ערך חדש:",
  updated: "✅ המודעה עודכנה בהצלחה.",
  updateFailed: "❌ העדכון נכשל. שלח/י שוב את הערך כדי לנסות שוב.",
  adNotFound: "⚠️ המודעה לא נמצאה או שאינה שלך.",
  deleted: "✅ המודעה נמחקה.",
  noAds: "📭 אין מודעות להצגה כרגע.",
  noMyAds: "📭 אין לך מודעות כרגע.",
  noAdsInArea: (label: string) => `📭 אין מודעות זמינות באזור ${label}.`,
  chooseFilterArea: "📍 בחר/י אזור להצגת מודעות:",
  backToMenuPrompt: "⬅️ חזרה לתפריט הראשי:",
  alreadyReported: "⚠️ כבר דיווחת על מודעה זו.",
  reportRecorded: "✅ תודה! הדיווח התקבל ונבדוק את המודעה בהקדם.",
  autoDeleted: (threshold: number) => `🚫 המודעה נמחקה אוטומטית לאחר שקיבלה ${threshold} דיווחים.`,
  reportedAdMissing: "⚠️ המודעה כבר לא קיימת.",
  genericError: "❌ קרתה שגיאה. נסה/י שוב מאוחר יותר."
} as const;

export const BUTTON = {
  postAd: "📤 פרסום מודעה",
  myAds: "📋 הצגת המודעות שלי",
  allAds: "🌍 כל המודעות",
  searchByArea: "🔎 חיפוש לפי אזור",
  backToMenu: "🔙 חזרה לתפריט",
  report: "🚩 דווח",
  edit: "📝 ערוך",
  delete: "🗑️ מחק"
} as const;

export function formatAd(ad: DbAd): string {
  return (
    `👤 שם: ${ad.name}\n` +
    `📞 טלפון: ${ad.phone}\n` +
    `📍 אזור: ${areaLabel(ad.area)}\n` +
    `🏘️ עיר: ${ad.city}\n` +
    `👥 מספר אורחים: ${ad.capacity}\n` +
    `📅 תאריך: ${ad.date_available}`
  );
}
