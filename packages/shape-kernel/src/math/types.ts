export type Point = {
  x: number;
  y: number;
};

export type Rect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type Transform2D = {
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
};
