/**
 * Panel Controller
 * One handler per form submission. Each mutation either redirects back to the
 * zone view (which re-fetches everything) or renders the page again with errors.
 */
import type { Request, Response } from 'express';
import { createElement } from 'react';
import { createChildLogger } from '../../core/Logger.js';
import { ProviderError } from '../../providers/errors.js';
import { selectZone, type PanelService } from '../../services/PanelService.js';
import type { SessionService } from '../../services/SessionService.js';
import { isEditableType, type FlashMessage } from '../../types/index.js';
import {
  emptyRecordFormValues,
  PanelPage,
  recordFormValuesFromBody,
  type PanelPageProps,
  type RecordFormState,
  type RecordRowState,
} from '../../views/index.js';
import { ApiError, asyncHandler, findSession, requireSession } from '../middleware/index.js';
import { sendPage } from '../render.js';
import {
  panelQuerySchema,
  parseDeleteForm,
  parseRecordForm,
  parseTokenForm,
  resourceIdSchema,
} from '../validation.js';

const logger = createChildLogger({ service: 'PanelController' });

export const NO_TOKEN_MESSAGE = 'Enter a Cloudflare API token and choose "Use token" to get started.';
export const NO_ZONES_MESSAGE = 'No zones found. Check that the token has the Zone:Read and DNS:Edit permissions.';

export interface PanelControllerDeps {
  panel: PanelService;
  sessions: SessionService;
}

interface RenderOptions {
  status?: number;
  zoneId?: string;
  alerts?: FlashMessage[];
  tokenError?: string;
  createForm?: RecordFormState;
  recordState?: RecordRowState;
}

export function zonePath(zoneId: string): string {
  return `/?zone=${encodeURIComponent(zoneId)}`;
}

function parseZoneId(req: Request): string {
  const result = resourceIdSchema.safeParse(req.params['zoneId']);
  if (!result.success) {
    throw ApiError.notFound('Zone');
  }
  return result.data;
}

function parseRecordParams(req: Request): { zoneId: string; recordId: string } {
  const zoneId = parseZoneId(req);
  const result = resourceIdSchema.safeParse(req.params['recordId']);
  if (!result.success) {
    throw ApiError.notFound('Record');
  }
  return { zoneId, recordId: result.data };
}

/**
 * Rethrow anything that is not a provider failure; those are bugs for the error handler
 */
function asProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  throw error;
}

export function createPanelController({ panel, sessions }: PanelControllerDeps) {
  /**
   * Render the panel from live provider data
   */
  async function renderPanel(req: Request, res: Response, options: RenderOptions = {}): Promise<void> {
    const session = findSession(req);
    const query = panelQuerySchema.parse(req.query);
    const flash = session ? sessions.takeFlash(session) : [];
    const alerts: FlashMessage[] = [...flash, ...(options.alerts ?? [])];
    const apiToken = session?.apiToken ?? null;
    let status = options.status ?? 200;

    const props: PanelPageProps = {
      hasToken: apiToken !== null,
      alerts,
      tokenError: options.tokenError,
      zones: [],
      query,
      createForm: options.createForm ?? { values: emptyRecordFormValues(), errors: {} },
      recordState: options.recordState,
    };

    if (apiToken === null) {
      alerts.push({ kind: 'info', message: NO_TOKEN_MESSAGE });
      sendPage(res, status, createElement(PanelPage, props));
      return;
    }

    try {
      props.zones = await panel.listZones(apiToken);
    } catch (error) {
      const providerError = asProviderError(error);
      alerts.push({ kind: 'error', message: `Failed to load zones: ${providerError.message}` });
      status = status === 200 ? providerError.httpStatus : status;
      sendPage(res, status, createElement(PanelPage, props));
      return;
    }

    if (props.zones.length === 0) {
      alerts.push({ kind: 'warning', message: NO_ZONES_MESSAGE });
      sendPage(res, status, createElement(PanelPage, props));
      return;
    }

    const zone = selectZone(props.zones, options.zoneId ?? query.zone);
    props.zone = zone;

    if (zone) {
      try {
        props.listing = await panel.listRecords(apiToken, zone.id, {
          keyword: query.q,
          proxiedOnly: query.proxied,
        });
      } catch (error) {
        const providerError = asProviderError(error);
        alerts.push({ kind: 'error', message: `Failed to load DNS records: ${providerError.message}` });
        status = status === 200 ? providerError.httpStatus : status;
      }
    }

    sendPage(res, status, createElement(PanelPage, props));
  }

  /**
   * Mutations need a token; without one, send the operator back to the token form
   */
  function tokenOrRedirect(req: Request, res: Response): string | null {
    const apiToken = findSession(req)?.apiToken ?? null;
    if (apiToken === null) {
      sessions.addFlash(requireSession(req), 'warning', 'Enter an API token before changing records.');
      res.redirect(303, '/');
    }
    return apiToken;
  }

  const showPanel = asyncHandler(async (req: Request, res: Response) => {
    await renderPanel(req, res);
  });

  const setToken = asyncHandler(async (req: Request, res: Response) => {
    const form = parseTokenForm(req.body);

    if (!form.success) {
      await renderPanel(req, res, { status: 400, tokenError: form.errors['apiToken'] });
      return;
    }

    const session = requireSession(req);
    sessions.setToken(session, form.data.apiToken);
    sessions.addFlash(session, 'success', 'API token set for this session.');
    res.redirect(303, '/');
  });

  const clearToken = asyncHandler(async (req: Request, res: Response) => {
    const session = requireSession(req);
    sessions.clearToken(session);
    sessions.addFlash(session, 'success', 'API token cleared. Nothing was stored.');
    res.redirect(303, '/');
  });

  const createRecord = asyncHandler(async (req: Request, res: Response) => {
    const zoneId = parseZoneId(req);
    const apiToken = tokenOrRedirect(req, res);
    if (apiToken === null) return;

    const form = parseRecordForm(req.body);
    if (!form.success) {
      logger.debug({ zoneId, fields: Object.keys(form.errors) }, 'Create form rejected');
      await renderPanel(req, res, {
        status: 400,
        zoneId,
        createForm: { values: recordFormValuesFromBody(req.body), errors: form.errors },
      });
      return;
    }

    try {
      const record = await panel.createRecord(apiToken, zoneId, form.data);
      sessions.addFlash(requireSession(req), 'success', `Record created: ${record.type} ${record.name}`);
      res.redirect(303, zonePath(zoneId));
    } catch (error) {
      const providerError = asProviderError(error);
      await renderPanel(req, res, {
        status: providerError.httpStatus,
        zoneId,
        alerts: [{ kind: 'error', message: `Failed to create record: ${providerError.message}` }],
        createForm: { values: recordFormValuesFromBody(req.body), errors: {} },
      });
    }
  });

  const updateRecord = asyncHandler(async (req: Request, res: Response) => {
    const { zoneId, recordId } = parseRecordParams(req);
    const apiToken = tokenOrRedirect(req, res);
    if (apiToken === null) return;

    const failed = async (error: unknown): Promise<void> => {
      const providerError = asProviderError(error);
      await renderPanel(req, res, {
        status: providerError.httpStatus,
        zoneId,
        alerts: [{ kind: 'error', message: `Failed to save record: ${providerError.message}` }],
        recordState: { recordId, values: recordFormValuesFromBody(req.body), errors: {} },
      });
    };

    let storedType: string;
    try {
      storedType = (await panel.getRecord(apiToken, zoneId, recordId)).type;
    } catch (error) {
      await failed(error);
      return;
    }

    if (!isEditableType(storedType)) {
      await renderPanel(req, res, {
        status: 400,
        zoneId,
        alerts: [{ kind: 'error', message: `${storedType} records cannot be edited here.` }],
        recordState: { recordId, errors: {} },
      });
      return;
    }

    const form = parseRecordForm(req.body, storedType);
    if (!form.success) {
      await renderPanel(req, res, {
        status: 400,
        zoneId,
        recordState: { recordId, values: recordFormValuesFromBody(req.body), errors: form.errors },
      });
      return;
    }

    try {
      const record = await panel.updateRecord(apiToken, zoneId, recordId, form.data);
      sessions.addFlash(requireSession(req), 'success', `Record saved: ${record.type} ${record.name}`);
      res.redirect(303, zonePath(zoneId));
    } catch (error) {
      await failed(error);
    }
  });

  const deleteRecord = asyncHandler(async (req: Request, res: Response) => {
    const { zoneId, recordId } = parseRecordParams(req);
    const apiToken = tokenOrRedirect(req, res);
    if (apiToken === null) return;

    const form = parseDeleteForm(req.body);
    if (!form.success) {
      await renderPanel(req, res, {
        status: 400,
        zoneId,
        recordState: { recordId, errors: form.errors },
      });
      return;
    }

    try {
      await panel.deleteRecord(apiToken, zoneId, recordId);
      sessions.addFlash(requireSession(req), 'success', 'Record deleted.');
      res.redirect(303, zonePath(zoneId));
    } catch (error) {
      const providerError = asProviderError(error);
      await renderPanel(req, res, {
        status: providerError.httpStatus,
        zoneId,
        alerts: [{ kind: 'error', message: `Failed to delete record: ${providerError.message}` }],
        recordState: { recordId, errors: {} },
      });
    }
  });

  return {
    showPanel,
    setToken,
    clearToken,
    createRecord,
    updateRecord,
    deleteRecord,
  };
}

export type PanelController = ReturnType<typeof createPanelController>;
