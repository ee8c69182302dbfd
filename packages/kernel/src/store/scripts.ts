/**
 * Lua scripts backing the atomic operations of RedisKeyStore.
 *
 * Redis runs each script without interleaving other commands, which is
 * what makes check-then-write sequences (rate-limit hits, bounded enqueue,
 * claim, complete/fail compare-and-set) safe across processes.
 */

/**
 * KEYS[1] window zset
 * ARGV now, windowMs, limit, cost, memberId
 * -> {allowed, count, retryAfterMs, resetMs}
 */
export const SLIDING_WINDOW_SCRIPT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local limit = tonumber(ARGV[3])
local cost = tonumber(ARGV[4])
local member = ARGV[5]

redis.call('ZREMRANGEBYSCORE', key, '-inf', now - window)
local current = redis.call('ZCARD', key)

if current + cost > limit then
  local retry_after = window
  local idx = current + cost - limit - 1
  if idx < current then
    local entry = redis.call('ZRANGE', key, idx, idx, 'WITHSCORES')
    if entry[2] then
      retry_after = tonumber(entry[2]) + window - now
    end
  end
  local reset = window
  local newest = redis.call('ZRANGE', key, -1, -1, 'WITHSCORES')
  if newest[2] then
    reset = tonumber(newest[2]) + window - now
  end
  return {0, current, retry_after, reset}
end

for i = 1, cost do
  redis.call('ZADD', key, now, member .. ':' .. i)
end
redis.call('PEXPIRE', key, window)
return {1, current + cost, 0, window}
`;

/**
 * KEYS[1] bucket hash {tokens, last_refill}
 * ARGV now, capacity, refillPerMs, cost, ttlMs
 * -> {allowed, tokens, retryAfterMs, resetMs}
 */
export const TOKEN_BUCKET_SCRIPT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local capacity = tonumber(ARGV[2])
local rate = tonumber(ARGV[3])
local cost = tonumber(ARGV[4])
local ttl = tonumber(ARGV[5])

local state = redis.call('HMGET', key, 'tokens', 'last_refill')
local tokens = tonumber(state[1])
local last = tonumber(state[2])
if tokens == nil or last == nil then
  tokens = capacity
  last = now
end

tokens = math.min(capacity, tokens + math.max(0, now - last) * rate)

local allowed = 0
local retry_after = 0
if tokens >= cost then
  tokens = tokens - cost
  allowed = 1
else
  retry_after = math.ceil((cost - tokens) / rate)
end

redis.call('HSET', key, 'tokens', tostring(tokens), 'last_refill', tostring(now))
redis.call('PEXPIRE', key, ttl)
return {allowed, math.floor(tokens), retry_after, math.ceil((capacity - tokens) / rate)}
`;

/**
 * KEYS[1] counter
 * ARGV windowMs, limit, cost
 * -> {allowed, count, resetMs}
 */
export const FIXED_WINDOW_SCRIPT = `
local key = KEYS[1]
local window = tonumber(ARGV[1])
local limit = tonumber(ARGV[2])
local cost = tonumber(ARGV[3])

local current = tonumber(redis.call('GET', key) or '0')
local ttl = redis.call('PTTL', key)
if current + cost > limit then
  if ttl < 0 then ttl = window end
  return {0, current, ttl}
end

current = redis.call('INCRBY', key, cost)
if ttl < 0 then
  redis.call('PEXPIRE', key, window)
  ttl = window
end
return {1, current, ttl}
`;

/**
 * KEYS[1] entry hash
 * ARGV now, ttlMs, field, value, ...
 * -> version
 */
export const VERSIONED_WRITE_SCRIPT = `
local key = KEYS[1]
local ttl = tonumber(ARGV[2])
local version = redis.call('HINCRBY', key, 'version', 1)
redis.call('HSETNX', key, 'createdAt', ARGV[1])
if #ARGV > 2 then
  redis.call('HSET', key, unpack(ARGV, 3))
end
if ttl > 0 then
  redis.call('PEXPIRE', key, ttl)
else
  redis.call('PERSIST', key)
end
return version
`;

/**
 * KEYS[1] progress hash
 * ARGV now, kind, steps, completedSteps, totalSteps, hasMessage, message, error, activeTtlMs, terminalTtlMs
 * An empty completedSteps or totalSteps keeps the stored value.
 * -> {'ok', {field, value, ...}} | {'not_found'} | {'terminal', status}
 */
export const PROGRESS_SCRIPT = `
local key = KEYS[1]
local state = redis.call('HMGET', key, 'status', 'completedSteps', 'totalSteps')
local status = state[1]
if not status then
  return {'not_found'}
end
if status ~= 'in_progress' then
  return {'terminal', status}
end

local stored = tonumber(state[2]) or 0
local total = tonumber(state[3]) or 0
local completed = stored
local next_status = 'in_progress'
local kind = ARGV[2]
if kind == 'increment' then
  completed = stored + tonumber(ARGV[3])
elseif kind == 'set' then
  if ARGV[5] ~= '' then total = tonumber(ARGV[5]) end
  if ARGV[4] ~= '' then completed = tonumber(ARGV[4]) end
elseif kind == 'complete' then
  completed = total
  next_status = 'completed'
elseif kind == 'fail' then
  next_status = 'failed'
end
completed = math.min(total, completed)

redis.call('HSET', key, 'totalSteps', tostring(total), 'completedSteps', tostring(completed),
  'status', next_status, 'updatedAt', ARGV[1])
if kind == 'fail' then
  redis.call('HSET', key, 'lastMessage', ARGV[8], 'error', ARGV[8])
elseif ARGV[6] == '1' then
  redis.call('HSET', key, 'lastMessage', ARGV[7])
end
if next_status == 'in_progress' then
  redis.call('PEXPIRE', key, tonumber(ARGV[9]))
else
  redis.call('PEXPIRE', key, tonumber(ARGV[10]))
end
return {'ok', redis.call('HGETALL', key)}
`;

// Shared by claim and promote. Expects KEYS[1] pending, KEYS[2] delayed,
// KEYS[4] sequence and locals now, prefix, factor, promote_limit.
const PROMOTE_DUE = `
local promoted = 0
local due = redis.call('ZRANGEBYSCORE', KEYS[2], '-inf', now, 'LIMIT', 0, promote_limit)
for _, id in ipairs(due) do
  redis.call('ZREM', KEYS[2], id)
  local priority = redis.call('HGET', prefix .. id, 'priority')
  if priority then
    local seq = redis.call('INCR', KEYS[4])
    redis.call('ZADD', KEYS[1], tonumber(priority) * factor + seq, id)
    promoted = promoted + 1
  end
end
`;

/**
 * KEYS pending, delayed, sequence, stats, task hash, tenant counter
 * ARGV taskId, priority, availableAt, now, maxSize, tenantLimit, factor, field, value, ...
 * -> {'enqueued', delayed} | {'queue_full', size} | {'tenant_full', size}
 * An existing task that is not dead-lettered is left alone and reported as enqueued.
 */
export const ENQUEUE_SCRIPT = `
local existing = redis.call('HGET', KEYS[5], 'status')
if existing and existing ~= 'dead_lettered' then
  if redis.call('ZSCORE', KEYS[2], ARGV[1]) then
    return {'enqueued', 1}
  end
  return {'enqueued', 0}
end

local size = redis.call('ZCARD', KEYS[1]) + redis.call('ZCARD', KEYS[2])
if size >= tonumber(ARGV[5]) then
  return {'queue_full', size}
end
local tenant_size = tonumber(redis.call('GET', KEYS[6]) or '0')
if tenant_size >= tonumber(ARGV[6]) then
  return {'tenant_full', tenant_size}
end

redis.call('DEL', KEYS[5])
redis.call('HSET', KEYS[5], unpack(ARGV, 8))
redis.call('INCR', KEYS[6])
redis.call('HINCRBY', KEYS[4], 'enqueued', 1)

local available_at = tonumber(ARGV[3])
if available_at > tonumber(ARGV[4]) then
  redis.call('ZADD', KEYS[2], available_at, ARGV[1])
  return {'enqueued', 1}
end
local seq = redis.call('INCR', KEYS[3])
redis.call('ZADD', KEYS[1], tonumber(ARGV[2]) * tonumber(ARGV[7]) + seq, ARGV[1])
return {'enqueued', 0}
`;

/**
 * KEYS pending, delayed, processing, sequence, stats
 * ARGV now, workerId, processingTimeoutMs, taskPrefix, factor, promoteLimit
 * -> {taskId, {field, value, ...}} | nil
 */
export const CLAIM_SCRIPT = `
local now = tonumber(ARGV[1])
local prefix = ARGV[4]
local factor = tonumber(ARGV[5])
local promote_limit = tonumber(ARGV[6])
${PROMOTE_DUE}
while true do
  local head = redis.call('ZRANGE', KEYS[1], 0, 0)
  if #head == 0 then
    return false
  end
  local id = head[1]
  redis.call('ZREM', KEYS[1], id)
  local task_key = prefix .. id
  if redis.call('HGET', task_key, 'status') == 'queued' then
    redis.call('HSET', task_key, 'status', 'in_progress', 'startedAt', ARGV[1], 'workerId', ARGV[2],
      'settledBy', '', 'settledAs', '')
    redis.call('HINCRBY', task_key, 'attempts', 1)
    redis.call('ZADD', KEYS[3], now + tonumber(ARGV[3]), id)
    redis.call('HINCRBY', KEYS[5], 'dequeued', 1)
    return {id, redis.call('HGETALL', task_key)}
  end
end
`;

/**
 * KEYS pending, delayed, (unused), sequence
 * ARGV now, taskPrefix, factor, limit
 * -> promoted count
 */
export const PROMOTE_SCRIPT = `
local now = tonumber(ARGV[1])
local prefix = ARGV[2]
local factor = tonumber(ARGV[3])
local promote_limit = tonumber(ARGV[4])
${PROMOTE_DUE}
return promoted
`;

/**
 * KEYS processing, stats, task hash, tenant counter
 * ARGV taskId, retentionMs, workerId, attempt, field, value, ...
 * -> {'ok', {field, value, ...}} | {'not_found'} | {'invalid_state', status}
 */
export const COMPLETE_SCRIPT = `
local task = redis.call('HMGET', KEYS[3], 'status', 'workerId', 'attempts', 'settledBy', 'settledAs')
local status = task[1]
if not status then
  return {'not_found'}
end
local token = ARGV[3] .. ':' .. ARGV[4]
if task[4] == token and task[5] == 'succeeded' then
  return {'ok', redis.call('HGETALL', KEYS[3])}
end
if status ~= 'in_progress' or task[2] ~= ARGV[3] or task[3] ~= ARGV[4] then
  return {'invalid_state', status}
end

redis.call('HSET', KEYS[3], 'status', 'succeeded', 'settledBy', token, 'settledAs', 'succeeded', unpack(ARGV, 5))
redis.call('ZREM', KEYS[1], ARGV[1])
if tonumber(redis.call('GET', KEYS[4]) or '0') > 0 then
  redis.call('DECR', KEYS[4])
end
redis.call('HINCRBY', KEYS[2], 'completed', 1)
redis.call('PEXPIRE', KEYS[3], tonumber(ARGV[2]))
return {'ok', redis.call('HGETALL', KEYS[3])}
`;

/**
 * KEYS processing, delayed, stats, task hash, tenant counter, dead-letter hash, dead-letter index
 * ARGV taskId, now, error, retryAt, retentionMs, workerId, attempt
 * -> {'retry', attempts} | {'dead_lettered', attempts} | {'not_found'} | {'invalid_state', status}
 */
export const FAIL_SCRIPT = `
local task = redis.call('HMGET', KEYS[4], 'status', 'workerId', 'attempts', 'settledBy', 'settledAs', 'maxAttempts')
local status = task[1]
if not status then
  return {'not_found'}
end
local token = ARGV[6] .. ':' .. ARGV[7]
if task[4] == token and (task[5] == 'retry' or task[5] == 'dead_lettered') then
  return {task[5], tonumber(ARGV[7])}
end
if status ~= 'in_progress' or task[2] ~= ARGV[6] or task[3] ~= ARGV[7] then
  return {'invalid_state', status}
end

local attempts = tonumber(task[3] or '0')
local max_attempts = tonumber(task[6] or '1')
redis.call('ZREM', KEYS[1], ARGV[1])
redis.call('HINCRBY', KEYS[3], 'failed', 1)

if attempts < max_attempts then
  redis.call('HSET', KEYS[4], 'status', 'queued', 'lastError', ARGV[3], 'availableAt', ARGV[4], 'workerId', '',
    'settledBy', token, 'settledAs', 'retry')
  redis.call('ZADD', KEYS[2], tonumber(ARGV[4]), ARGV[1])
  redis.call('HINCRBY', KEYS[3], 'retried', 1)
  return {'retry', attempts}
end

redis.call('HSET', KEYS[4], 'status', 'dead_lettered', 'lastError', ARGV[3], 'completedAt', ARGV[2], 'workerId', '',
  'settledBy', token, 'settledAs', 'dead_lettered')
redis.call('DEL', KEYS[6])
redis.call('HSET', KEYS[6], unpack(redis.call('HGETALL', KEYS[4])))
redis.call('HSET', KEYS[6], 'reason', ARGV[3], 'failedAt', ARGV[2])
redis.call('ZADD', KEYS[7], tonumber(ARGV[2]), ARGV[1])
if tonumber(redis.call('GET', KEYS[5]) or '0') > 0 then
  redis.call('DECR', KEYS[5])
end
redis.call('HINCRBY', KEYS[3], 'dead_lettered', 1)
redis.call('PEXPIRE', KEYS[4], tonumber(ARGV[5]))
return {'dead_lettered', attempts}
`;
