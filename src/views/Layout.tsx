import type { ReactNode } from 'react';

const styles = `
  * { box-sizing: border-box; }
  body { margin: 0; font-family: system-ui, -apple-system, "Segoe UI", sans-serif; background: #f6f7f9; color: #1f2933; }
  header { padding: 1rem 1.5rem; background: #1f2933; color: #fff; }
  header h1 { margin: 0; font-size: 1.25rem; }
  .layout { display: flex; gap: 1.5rem; padding: 1.5rem; align-items: flex-start; }
  aside { width: 320px; flex-shrink: 0; }
  main { flex: 1; min-width: 0; }
  .card { background: #fff; border: 1px solid #d9dee3; border-radius: 6px; padding: 1rem; margin-bottom: 1rem; }
  .card h2 { margin-top: 0; font-size: 1.05rem; }
  .columns { display: flex; gap: 1.5rem; align-items: flex-start; }
  .columns > .records { flex: 3; min-width: 0; }
  .columns > .create { flex: 2; }
  label { display: block; font-size: 0.85rem; margin-bottom: 0.6rem; }
  label.inline { display: inline-flex; gap: 0.35rem; align-items: center; }
  input[type=text], input[type=password], input[type=number], select { display: block; width: 100%; padding: 0.4rem; margin-top: 0.2rem; border: 1px solid #c4ccd4; border-radius: 4px; }
  button { padding: 0.45rem 0.9rem; border: 1px solid #3e4c59; border-radius: 4px; background: #3e4c59; color: #fff; cursor: pointer; }
  button.secondary { background: #fff; color: #3e4c59; }
  button.danger { background: #b42318; border-color: #b42318; }
  .alert { padding: 0.7rem 1rem; border-radius: 4px; margin-bottom: 0.75rem; border: 1px solid; }
  .alert-success { background: #ecfdf3; border-color: #6ce9a6; }
  .alert-error { background: #fef3f2; border-color: #fda29b; }
  .alert-warning { background: #fffaeb; border-color: #fec84b; }
  .alert-info { background: #eff8ff; border-color: #84caff; }
  .field-error { color: #b42318; font-size: 0.8rem; }
  .toolbar { display: flex; gap: 0.75rem; align-items: flex-end; flex-wrap: wrap; }
  .toolbar label { margin-bottom: 0; }
  .caption { color: #52606d; font-size: 0.85rem; }
  details.record { border: 1px solid #d9dee3; border-radius: 4px; margin-bottom: 0.5rem; background: #fff; }
  details.record summary { padding: 0.55rem 0.75rem; cursor: pointer; font-family: ui-monospace, monospace; font-size: 0.85rem; }
  details.record .body { padding: 0.75rem; border-top: 1px solid #eef0f2; }
  .row { display: flex; gap: 0.75rem; flex-wrap: wrap; }
  .row > label { flex: 1; min-width: 140px; }
  .actions { display: flex; gap: 1rem; align-items: center; margin-top: 0.5rem; }
`;

export interface LayoutProps {
  title?: string;
  children: ReactNode;
}

export function Layout({ title = 'Cloudflare DNS Panel', children }: LayoutProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{title}</title>
        <style dangerouslySetInnerHTML={{ __html: styles }} />
      </head>
      <body>
        <header>
          <h1>Cloudflare DNS Panel</h1>
        </header>
        {children}
      </body>
    </html>
  );
}
