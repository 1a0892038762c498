import type { Complaint, ComplaintStatus } from "./complaint.types";

export type AuthorityAction = {
  status: ComplaintStatus;
  adminRemarks?: string;
};

/**
 * Pure domain rule: applies an authority action to one complaint.
 * Any status may move to any status, including itself for remark-only edits.
 *
 * Only `status` and `adminRemarks` change. AI fields, citizen-declared
 * fields and clusterFlag are left as they are; the next escalation pass
 * recomputes the flag.
 */
export function transitionComplaintStatus(
  complaint: Complaint,
  action: AuthorityAction,
): Complaint {
  return {
    ...complaint,
    status: action.status,
    adminRemarks: action.adminRemarks ?? complaint.adminRemarks,
  };
}
