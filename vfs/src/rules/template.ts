// Written when the sort file does not exist yet
export const DEFAULT_SORT_FILE = `# ==================================================
#                 debrid-vfs sort file
# ==================================================
#
# Lines starting with "#" are comments, empty lines are ignored.
#
# Regex folders: "/folder" + " == " + regular expression
#   Torrent names are tested against the rules from top to bottom and land
#   in the folder of the first match. Torrents matching no rule land in
#   "/default". A leading flag group such as (?i) makes the rule case
#   insensitive. Mind trailing spaces.
#   Example: /movies == (?i)(19|20)([0-9]{2} ?\\.?)
#
# Folders: "/folder"
#   Example: /archive
#
# Moves and renames: "/" + torrent name + "/" + file id + " -> " + destination
#   A whole torrent is moved with "/" + torrent name + "/" as the key.
#   Missing folders on the destination path are created automatically.
#   Example: /some.show.S01/ -> /shows/some.show/season 1/
#   Example: /some.show.S01/ABCDEFGHIJKLM -> /shows/some.show/season 1/episode 1.mkv

# ==================================================
#           top level and regex folders
# ==================================================

/shows == (?i)(S[0-9]{2}|SEASONS?.[0-9]|COMPLETE|[^457a-z\\W\\s]-[0-9]+)
/movies == (?i)(19|20)([0-9]{2} ?\\.?)
/default

# ==================================================
#         recorded changes to the structure
# ==================================================

`;
