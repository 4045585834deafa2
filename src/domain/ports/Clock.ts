/** 回傳目前 epoch 毫秒；tracker 與 poll loop 共用同一個 clock */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
