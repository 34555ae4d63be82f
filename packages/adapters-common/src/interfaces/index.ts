export type { IIdentityService } from "./identity-service";
export type { ISecretsEngine } from "./secrets-service";
export type { ICredentialSource } from "./secret-rotation";
export type { IComputeProbe } from "./compute-service";
