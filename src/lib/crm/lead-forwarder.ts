/**
 * Forwards stored leads to the CRM as contacts.
 *
 * The call is detached from the request that created the lead: `forward`
 * returns immediately, the HTTP client's timeout bounds the call, and any
 * failure is logged and dropped. Without an API key the integration is off.
 */

import axios, { AxiosInstance } from 'axios';
import logger from 'jet-logger';
import type { ScoredLead } from '@/entities/leads/leads.dto';
import { DEFAULT_LEAD_SOURCE } from '@/config/constants';

export const CRM_CONTACTS_PATH = '/crm/v3/objects/contacts';

export interface CrmContactPayload {
  properties: {
    email: string;
    firstname: string;
    phone: string;
    message: string;
    tags: string;
    source: string;
    property_id: string;
  };
}

export interface LeadForwarder {
  forward(lead: ScoredLead): void;
}

export function toContactPayload(lead: ScoredLead): CrmContactPayload {
  return {
    properties: {
      email: lead.email ?? '',
      firstname: lead.name,
      phone: lead.phone ?? '',
      message: lead.message ?? '',
      tags: lead.tags.join(','),
      source: lead.source || DEFAULT_LEAD_SOURCE,
      property_id: lead.property_id ?? '',
    },
  };
}

function describeFailure(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.response ? `HTTP ${error.response.status}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export class CrmLeadForwarder implements LeadForwarder {
  constructor(
    private readonly apiKey: string | undefined,
    private readonly client: Pick<AxiosInstance, 'post'>,
  ) {}

  get enabled(): boolean {
    return Boolean(this.apiKey);
  }

  forward(lead: ScoredLead): void {
    if (!this.enabled) {
      return;
    }
    void this.send(lead);
  }

  /**
   * Posts the contact and resolves with whether the CRM accepted it.
   * Never rejects.
   */
  async send(lead: ScoredLead): Promise<boolean> {
    if (!this.apiKey) {
      return false;
    }
    try {
      await this.client.post(CRM_CONTACTS_PATH, toContactPayload(lead), {
        headers: { Authorization: `Bearer ${this.apiKey}` },
      });
      logger.info(`[CRM] Lead "${lead.name}" forwarded`);
      return true;
    } catch (error) {
      logger.warn(`[CRM] Forwarding lead "${lead.name}" failed: ${describeFailure(error)}`);
      return false;
    }
  }
}

