import type { FlashMessage } from '../types/index.js';

export function Alert({ kind, message }: FlashMessage) {
  return (
    <div className={`alert alert-${kind}`} role={kind === 'error' ? 'alert' : 'status'}>
      {message}
    </div>
  );
}

export function AlertList({ alerts }: { alerts: FlashMessage[] }) {
  return (
    <>
      {alerts.map((alert, index) => (
        <Alert key={index} kind={alert.kind} message={alert.message} />
      ))}
    </>
  );
}

export function FieldError({ message }: { message?: string }) {
  return message ? <span className="field-error">{message}</span> : null;
}
