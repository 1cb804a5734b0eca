import type { Transport } from '../core/transport.js';
import type { JsonObject } from '../core/types.js';
import type { InviteMemberParams, TeamOverview, TeamRole } from './types.js';

/** Team membership of the institution. */
export class TeamResource {
  #transport: Transport;

  constructor(transport: Transport) {
    this.#transport = transport;
  }

  /** Lists members, pending invitations and stats. */
  list(): Promise<TeamOverview> {
    return this.#transport.execute({ method: 'GET', path: '/institutions/team/' });
  }

  /** Checks whether an address may be invited, with the server's recommendation. */
  checkEmail(email: string): Promise<JsonObject> {
    return this.#transport.execute({
      method: 'POST',
      path: '/institutions/team/check-email/',
      json: { email },
    });
  }

  invite({ email, role = 'issuer', sendEmail = true, addDirectly = false }: InviteMemberParams): Promise<JsonObject> {
    return this.#transport.execute({
      method: 'POST',
      path: '/institutions/team/invite/',
      json: {
        email,
        role,
        send_email: sendEmail,
        add_directly: addDirectly,
      },
    });
  }

  updateRole(memberId: string, role: TeamRole): Promise<JsonObject> {
    return this.#transport.execute({
      method: 'PATCH',
      path: '/institutions/team/members/{member_id}/role/',
      params: { member_id: memberId },
      json: { role },
    });
  }

  /** Deactivates a member (soft delete), optionally recording why. */
  deactivate(memberId: string, reason?: string): Promise<JsonObject> {
    return this.#transport.execute({
      method: 'POST',
      path: '/institutions/team/members/{member_id}/deactivate/',
      params: { member_id: memberId },
      json: reason ? { reason } : {},
    });
  }

  reactivate(memberId: string): Promise<JsonObject> {
    return this.#transport.execute({
      method: 'POST',
      path: '/institutions/team/members/{member_id}/reactivate/',
      params: { member_id: memberId },
    });
  }

  /** Removes a member for good (hard delete). */
  remove(memberId: string): Promise<JsonObject> {
    return this.#transport.execute({
      method: 'DELETE',
      path: '/institutions/team/members/{member_id}/remove/',
      params: { member_id: memberId },
    });
  }
}
