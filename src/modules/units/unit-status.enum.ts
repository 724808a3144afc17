export enum UnitStatus {
    AVAILABLE = 'available',
    RENTED = 'rented',
    SOLD = 'sold',
}
