import { Role, User } from './User';

export class Admin extends User {
  readonly role = Role.Admin;

  profileSummary(): string {
    return [...this.accountLines(), 'Access: Platform administration'].join(
      '\n',
    );
  }
}
