export interface Credentials {
    username: string;
    password: string;
}

export interface Authenticator {
    authenticate(username: string, password: string): boolean;
}

/**
 * RFC 1929 check against a single configured pair. Plain string equality:
 * no lockout, no constant-time comparison.
 */
export function createAuthenticator(expected: Readonly<Credentials>): Authenticator {
    const { username: expectedUser, password: expectedPass } = expected;
    return {
        authenticate(username, password) {
            return username === expectedUser && password === expectedPass;
        },
    };
}
