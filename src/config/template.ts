/** Written by `assetpress init`. Must parse with the default loader. */
export const DEFAULT_CONFIG_TEMPLATE = `# assetpress configuration

[project]
name = "my-game"
output = "./build/assets"
source = "./assets"

# Presets select per-platform defaults; choose one with --preset.
# Omitted fields fall back to the per-kind defaults.
# audio_quality only affects ogg; wav is always 16-bit PCM.

[presets.mobile]
texture_max_size = 1024
texture_format = "png"
texture_quality = 75
audio_format = "wav"
audio_quality = 6
compress_textures = true
generate_mipmaps = true

[presets.desktop]
texture_max_size = 4096
texture_format = "png"
texture_quality = 90
audio_format = "wav"
audio_quality = 10
compress_textures = false
generate_mipmaps = true

[presets.web]
texture_max_size = 2048
texture_format = "webp"
texture_quality = 80
audio_format = "wav"
audio_quality = 7
compress_textures = true
generate_mipmaps = false

# Rules are glob = { overrides }. Later rules win field by field.
# Fields: format, atlas, trim, mipmap, draco, meshopt, normalize,
#         quality, max_size, output, padding, sample_rate

[rules]
"sprites/**/*.png" = { atlas = true, trim = true, padding = 2 }
"ui/**/*.png" = { mipmap = false }
"audio/music/*.wav" = { normalize = true }

[cache]
enabled = true
directory = ".assetpress-cache"
`;
