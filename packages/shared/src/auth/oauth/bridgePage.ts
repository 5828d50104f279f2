import { TOKEN_RECEIVED_PATH } from "../../constants";

// The token arrives in the URL fragment, which the browser never sends to
// the server. This page reads it client-side and hands it to the listener.
export const BRIDGE_PAGE_HTML = `<!DOCTYPE html>
<html>
  <head><title>tcx-bridge</title></head>
  <body>
    <p id="status">Completing authorization...</p>
    <script type="text/javascript">
      var params = new URLSearchParams(window.location.hash.substring(1));
      var accessToken = params.get("access_token");
      var state = params.get("state");
      var status = document.getElementById("status");
      if (accessToken && state) {
        var query = new URLSearchParams({ token: accessToken, state: state });
        fetch("${TOKEN_RECEIVED_PATH}?" + query.toString())
          .then(function (response) { return response.text(); })
          .then(function (text) { status.textContent = text; });
      } else {
        status.textContent = "Error: Access token or state not found in the URL fragment.";
      }
    </script>
  </body>
</html>
`;

export const COMPLETION_MESSAGES = {
  authorized: "Token received. State matches the one sent in the authorization URL. You can close this window.",
  missing_token: "No token received.",
  state_mismatch: "The redirect request did not originate from this session.",
  already_completed: "Authorization already completed.",
} as const;
