export type AuthRule =
  | { kind: 'public' }
  | { kind: 'learner' };

export const Auth = {
  public: (): AuthRule => ({ kind: 'public' }),
  learner: (): AuthRule => ({ kind: 'learner' })
};
