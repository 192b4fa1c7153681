const EMPTY = "—";

const fixed = (value: number, digits: number) => (Number.isFinite(value) ? value.toFixed(digits) : null);

export const formatPercent = (value?: number | null, digits = 1) => {
  if (value == null) return EMPTY;
  const text = fixed(value, digits);
  return text == null ? EMPTY : `${text}%`;
};

export const formatTemperature = (value: number) => `${Number.isInteger(value) ? value : value.toFixed(1)}°C`;

export const formatAmps = (value: number, digits = 1) => {
  const text = fixed(value, digits);
  return text == null ? EMPTY : `${text} A`;
};

export const formatMilliamps = (value: number) => {
  const text = fixed(value, 0);
  return text == null ? EMPTY : `${text} mA`;
};

export const formatVolts = (value: number, digits = 2) => {
  const text = fixed(value, digits);
  return text == null ? EMPTY : `${text} V`;
};

export const formatKw = (value: number) => {
  const text = fixed(value, 1);
  return text == null ? EMPTY : `${text} kW`;
};

export const formatOhms = (value: number, digits = 3) => {
  const text = fixed(value, digits);
  return text == null ? EMPTY : `${text} Ω`;
};
