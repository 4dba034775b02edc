import { Layout } from './Layout.js';

export interface ErrorPageProps {
  status: number;
  message: string;
}

export function ErrorPage({ status, message }: ErrorPageProps) {
  return (
    <Layout title={`Error ${status} - Cloudflare DNS Panel`}>
      <main className="layout">
        <section className="card">
          <h2>Error {status}</h2>
          <div className="alert alert-error" role="alert">
            {message}
          </div>
          <a href="/">Back to the panel</a>
        </section>
      </main>
    </Layout>
  );
}
