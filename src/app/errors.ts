export class MissingTokenError extends Error {
  constructor() {
    super(
      "Missing auth. Use `copilot auth set-token` (or set COPILOT_TOKEN, or pass --token).",
    );
    this.name = "MissingTokenError";
  }
}

export class ConfirmationRequiredError extends Error {
  constructor(message = "Pass --yes to apply changes in non-interactive sessions.") {
    super(message);
    this.name = "ConfirmationRequiredError";
  }
}

export class ConfirmationDeclinedError extends Error {
  constructor() {
    super("Aborted: confirmation declined.");
    this.name = "ConfirmationDeclinedError";
  }
}
