export type CounterUpdated = {
  ok: true
  value: number
}

export type CounterFailed = {
  ok: false
}

export type CounterResult = CounterUpdated | CounterFailed
