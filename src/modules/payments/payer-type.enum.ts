export enum PayerType {
    TENANT = 'tenant',
    OWNER = 'owner',
}
