import { Types, classType, defineEntity } from "../../src";

/**
 * User entity, identified by a string id
 */
export class User {
  constructor(
    readonly userId: string,
    readonly email: string,
    readonly nickname: string,
  ) {}
}

export const UserType = classType(User);

export const userEntity = defineEntity(UserType, { idType: Types.string });

export const users = [
  new User("u1", "alice@example.com", "Alice"),
  new User("u2", "bob@example.com", "Bob"),
];
