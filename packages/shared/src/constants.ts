// Local redirect listener. The redirect URL registered with Fitbit must
// point at REDIRECT_HOST:REDIRECT_PORT + CALLBACK_PATH.
export const REDIRECT_HOST = "127.0.0.1";
export const REDIRECT_PORT = 8080;
export const CALLBACK_PATH = "/callback";
export const TOKEN_RECEIVED_PATH = "/token-received";

export const FITBIT_AUTHORIZE_URL = "https://www.fitbit.com/oauth2/authorize";
export const FITBIT_API_BASE_URL = "https://api.fitbit.com/1/user/-";

// Only request what the export actually reads
export const FITBIT_SCOPES = ["activity", "heartrate", "location", "profile"];

export const DEFAULT_CREDENTIALS_FILE = "credentials.json";

export const DEVICE_NAME = "Fitbit";

export const API_TIMEOUT_MS = 15_000;
