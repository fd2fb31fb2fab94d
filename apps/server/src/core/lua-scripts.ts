/**
 * Lua scripts for atomic task record operations
 */

// Partial update: writes only the given fields, fails when the record is missing
export const TASK_UPDATE_FIELDS = `
local task_key = KEYS[1]          -- {prefix}:task:{taskId}

-- Check task exists
local exists = redis.call('exists', task_key)
if exists == 0 then
  return {0, 'Task not found'}
end

-- ARGV holds field/value pairs
if #ARGV > 0 then
  redis.call('hset', task_key, unpack(ARGV))
end

return {1, redis.call('hgetall', task_key)}
`;
