/**
 * HTTP errors thrown from handlers and hooks; the app's error handler turns
 * them into `{ detail }` responses with `statusCode`.
 */
export class HttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, detail: string) {
    super(detail);
    this.name = "HttpError";
    this.statusCode = statusCode;
  }
}

/** User-facing messages, shown by the web client as is. */
export const MESSAGES = {
  NOT_FOUND: "Страница не найдена.",
  RECIPE_NOT_FOUND: "Рецепт не найден.",
  NOT_AUTHENTICATED: "Учетные данные не были предоставлены.",
  INVALID_TOKEN: "Недопустимый токен.",
  FORBIDDEN: "У вас недостаточно прав для выполнения данного действия.",
  WRONG_PASSWORD: "Неверный текущий пароль.",
  INVALID_CREDENTIALS: "Невозможно войти с предоставленными учетными данными.",
  EMAIL_TAKEN: "Пользователь с таким email уже существует.",
  USERNAME_TAKEN: "Пользователь с таким username уже существует.",
  VALIDATION_FAILED: "Ошибка валидации.",
  ALREADY_IN_CART: "Рецепт уже в списке покупок.",
  NOT_IN_CART: "Рецепта нет в списке покупок.",
  SHORT_LINK_UNAVAILABLE: "Не удалось создать короткую ссылку. Попробуйте ещё раз.",
  TOO_MANY_REQUESTS: "Слишком много запросов. Попробуйте позже.",
  INTERNAL: "Внутренняя ошибка сервера.",
} as const;
