/**
 * Caller Identity (v1)
 *
 * Produced upstream by token verification and trusted as-is.
 * Superadmin status is a claim of the current request only; it is never
 * written to the store and never cached.
 */
export type CallerIdentity = Readonly<{
    requestId: string;
    subjectId: string;      // identity-provider subject (users.id)
    displayName: string;
    email: string;
    superadmin: boolean;    // claim-asserted, recomputed per request
}>;

