export enum Role {
  ADMINISTRATOR = 1,
  STANDARD = 2,
}
