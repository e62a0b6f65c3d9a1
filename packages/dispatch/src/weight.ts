/**
 * Cost of converting one actual argument to one formal parameter type.
 *
 * Components are listed from most to least significant: any number of
 * promotions is cheaper than a single upcast, and any number of upcasts is
 * cheaper than one user-defined conversion.
 */
export type Weight = {
  readonly userDefined: number;
  readonly upcast: number;
  readonly promotion: number;
  readonly epsilon: number;
};

export type WeightInput = Partial<Weight>;

const WEIGHT_COMPONENTS = [
  "userDefined",
  "upcast",
  "promotion",
  "epsilon",
] as const satisfies readonly (keyof Weight)[];

export const createWeight = ({
  userDefined = 0,
  upcast = 0,
  promotion = 0,
  epsilon = 0,
}: WeightInput = {}): Weight =>
  Object.freeze({ userDefined, upcast, promotion, epsilon });

export const ZERO_WEIGHT: Weight = createWeight();

export const INFINITE_WEIGHT: Weight = createWeight({
  userDefined: Number.POSITIVE_INFINITY,
  upcast: Number.POSITIVE_INFINITY,
  promotion: Number.POSITIVE_INFINITY,
  epsilon: Number.POSITIVE_INFINITY,
});

export const isPossible = (weight: Weight): boolean =>
  WEIGHT_COMPONENTS.every((component) =>
    Number.isFinite(weight[component])
  );

export const compareWeights = (a: Weight, b: Weight): -1 | 0 | 1 => {
  for (const component of WEIGHT_COMPONENTS) {
    if (a[component] < b[component]) return -1;
    if (a[component] > b[component]) return 1;
  }
  return 0;
};

export const weightLessThan = (a: Weight, b: Weight): boolean =>
  compareWeights(a, b) < 0;

export const addWeights = (a: Weight, b: Weight): Weight => {
  if (!isPossible(a) || !isPossible(b)) return INFINITE_WEIGHT;
  return createWeight({
    userDefined: a.userDefined + b.userDefined,
    upcast: a.upcast + b.upcast,
    promotion: a.promotion + b.promotion,
    epsilon: a.epsilon + b.epsilon,
  });
};

export const allPossible = (weights: readonly Weight[]): boolean =>
  weights.every(isPossible);

export const formatWeight = (weight: Weight): string =>
  isPossible(weight)
    ? `(${weight.userDefined}, ${weight.upcast}, ${weight.promotion}, ${weight.epsilon})`
    : "(∞)";
