import type { AccountID, Allocation, Role } from '../L0/Ontology.js';

/**
 * Roles an account holds with respect to one allocation.
 * An account can hold several (a supervisor may also fund allocations).
 */
export function rolesOf(caller: AccountID, allocation: Allocation, supervisor: AccountID): Role[] {
    const roles: Role[] = [];
    if (caller === supervisor) roles.push('supervisor');
    if (caller === allocation.originator) roles.push('originator');
    if (caller === allocation.beneficiary) roles.push('beneficiary');
    return roles;
}

export function partiesOf(allocation: Allocation, supervisor: AccountID): Map<AccountID, Role[]> {
    const parties = new Map<AccountID, Role[]>();
    for (const account of [supervisor, allocation.originator, allocation.beneficiary]) {
        if (!parties.has(account)) parties.set(account, rolesOf(account, allocation, supervisor));
    }
    return parties;
}
