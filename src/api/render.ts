/**
 * Server-side rendering of the React views
 */
import type { Response } from 'express';
import type { ReactElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';

export function renderHtml(element: ReactElement): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(element)}`;
}

export function sendPage(res: Response, status: number, element: ReactElement): void {
  res.status(status).type('html').send(renderHtml(element));
}
