import { readOrEmpty, requireDatabase } from '../../lib/db/store';
import { serializeDoc } from '../../lib/db/serialize';
import { SerializedDocument, Store } from '../../lib/db/types';
import { findRecentLeads, insertLead } from '../../lib/db/repositories/leads';
import { scoreLead } from '../../lib/utils/lead-score';
import { LeadForwarder } from '../../lib/crm/lead-forwarder';
import { CreatedLeadResponse, LeadInput, ScoredLead } from './leads.dto';

export class LeadsService {
  constructor(
    private readonly store: Store,
    private readonly forwarder: LeadForwarder,
  ) {}

  /**
   * Scores and stores the lead, then hands it to the CRM forwarder without
   * waiting for it. A score sent by the client is discarded.
   */
  async create(input: LeadInput): Promise<CreatedLeadResponse> {
    const db = requireDatabase(this.store);
    const { score: _clientScore, ...fields } = input;
    const lead: ScoredLead = { ...fields, score: scoreLead(fields) };

    const id = await insertLead(db, lead);
    this.forwarder.forward(lead);

    return { id: id.toHexString(), score: lead.score };
  }

  list(limit: number): Promise<SerializedDocument[]> {
    return readOrEmpty(this.store, async (db) => {
      const docs = await findRecentLeads(db, limit);
      return docs.map((doc) => serializeDoc(doc));
    });
  }
}
