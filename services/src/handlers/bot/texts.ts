export const BOT_TITLE = "BuildTrack";

export const MAIN_MENU_TEXT = "🏠 <b>Главное меню</b>\n\nВыберите действие:";

export const ROLE_PROMPT = `👋 <b>Добро пожаловать в ${BOT_TITLE}!</b>\n\nБот для учета бюджета строительных и ремонтных проектов.\n\nВыберите вашу роль:`;

export const HELP_TEXT = [
  `🤖 <b>${BOT_TITLE}: справка</b>`,
  "",
  "/start - главное меню",
  "/status - текущий шаг диалога",
  "/cancel - отменить текущее действие",
  "/help - эта справка",
  "",
  "📂 <b>Проекты</b>: создание, расходы, фото, отчеты",
  "✅ <b>Согласования</b>: расходы, требующие одобрения",
  "📋 <b>Задачи</b>: список дел по проектам",
  "🎤 <b>Голосовой ввод</b>: расход голосовым сообщением",
].join("\n");

export const ABOUT_TEXT = [
  `ℹ️ <b>${BOT_TITLE}</b>`,
  "",
  "Учет бюджета, расходов и фотоотчетов по строительным проектам.",
  "Суммы указываются в BYN.",
].join("\n");

export const FALLBACK_TEXT = "🤔 Я не понял вашу команду.\n\nИспользуйте меню ниже или отправьте /help для справки.";
export const REGISTER_FIRST_TEXT = "👋 Отправьте /start, чтобы начать работу.";
export const STALE_ACTION_TEXT = "⚠️ Это действие сейчас недоступно";
export const CANCELLED_TEXT = "❌ Действие отменено";
export const GENERIC_FAILURE_TEXT = "❌ Произошла ошибка. Попробуйте еще раз.";
export const PROJECT_NOT_FOUND_TEXT = "❌ Проект не найден";
export const NO_PROJECTS_TEXT = "📭 У вас пока нет проектов.\n\nСоздайте первый проект через меню.";
export const CHOOSE_PROJECT_TEXT = "📂 <b>Выберите проект:</b>";
export const USE_BUTTONS_TEXT = "👆 Пожалуйста, выберите вариант с помощью кнопок.";
export const VOICE_UNAVAILABLE_TEXT = "🎤 Голосовой ввод недоступен.";
export const SKIP_UNAVAILABLE_TEXT = "⏭️ Этот шаг нельзя пропустить.";
