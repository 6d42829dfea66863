import { Lead } from './lead.entity';
import { User } from '../accounts/user.entity';

/** What a lead reader learns about the assignee. */
export interface AssigneeSummary {
  id: number;
  username: string;
  fullName: string;
  email: string;
}

export type LeadView = Omit<Lead, 'assignedTo'> & {
  assignedTo: AssigneeSummary | null;
};

function toAssigneeSummary(user: User): AssigneeSummary {
  return {
    id: user.id,
    username: user.username,
    fullName: user.fullName,
    email: user.email,
  };
}

/** Keeps identity and staff flags of the assignee out of lead responses. */
export function toLeadView(lead: Lead): LeadView {
  const { assignedTo, ...rest } = lead;
  return {
    ...rest,
    assignedTo: assignedTo ? toAssigneeSummary(assignedTo) : null,
  };
}
