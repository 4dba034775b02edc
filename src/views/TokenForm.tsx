import { FieldError } from './Alert.js';

export interface TokenFormProps {
  hasToken: boolean;
  error?: string;
}

/**
 * The token only lives in the server-side session of this browser
 */
export function TokenForm({ hasToken, error }: TokenFormProps) {
  return (
    <section className="card">
      <h2>Authentication (not stored)</h2>
      <form method="post" action="/session/token">
        <label>
          Cloudflare API token
          <input type="password" name="apiToken" placeholder="Paste token..." autoComplete="off" />
          <FieldError message={error} />
        </label>
        <button type="submit">Use token</button>
      </form>
      {hasToken && (
        <form method="post" action="/session/clear" className="actions">
          <span className="caption">A token is set for this session.</span>
          <button type="submit" className="secondary">
            Clear token
          </button>
        </form>
      )}
    </section>
  );
}
