/** Discord user id to external (FACEIT) handle. */
export type IdentityLinks = {
  getLinkedHandle(userId: string): Promise<string | null>;
  setLink(userId: string, handle: string): Promise<void>;
  removeLink(userId: string): Promise<boolean>;
};

export class InMemoryIdentityLinks implements IdentityLinks {
  private readonly links = new Map<string, string>();

  async getLinkedHandle(userId: string): Promise<string | null> {
    return this.links.get(userId) ?? null;
  }

  async setLink(userId: string, handle: string): Promise<void> {
    this.links.set(userId, handle);
  }

  async removeLink(userId: string): Promise<boolean> {
    return this.links.delete(userId);
  }
}
